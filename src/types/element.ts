export interface BoundingBox {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface ElementDescriptor {
  id: string;
  /** Lowercased icon name, brief text and icon name without its " button" suffix. */
  aliases: ReadonlySet<string>;
  /** Lowercased brief text, used for label containment matching. */
  label: string;
  iconName: string;
  boundingBox: BoundingBox;
}
