export interface WindowFrame {
  originX: number;
  originY: number;
  visible: boolean;
}
