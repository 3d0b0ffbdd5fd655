import type { ButtonSymbol, ElementDescriptor } from '../types/index.js';
import { ButtonNotFoundError, RegistryFormatError } from '../exception/errors.js';
import { RegistryDocumentSchema } from '../schemas/registry.schema.js';
import type { RegistryNode } from '../schemas/registry.schema.js';
import { BUTTON_SYMBOLS, SYMBOL_ALIASES } from './symbol-aliases.js';

export const DEFAULT_REGISTRY_STATE = 'root';

const BUTTON_SUFFIX = / button$/;

export interface RegistryOptions {
  stateId?: string;
  /** Where the document came from, for error context. */
  source?: string;
}

/**
 * Read-only index of the target application's UI elements. Built once at
 * startup and handed to whatever needs lookups.
 */
export class ElementRegistry {
  private readonly byId: ReadonlyMap<string, ElementDescriptor>;
  private readonly byAlias: ReadonlyMap<string, readonly ElementDescriptor[]>;

  private constructor(descriptors: readonly ElementDescriptor[]) {
    const byId = new Map<string, ElementDescriptor>();
    const byAlias = new Map<string, ElementDescriptor[]>();

    for (const descriptor of descriptors) {
      byId.set(descriptor.id, descriptor);
      for (const alias of descriptor.aliases) {
        const list = byAlias.get(alias) ?? [];
        list.push(descriptor);
        byAlias.set(alias, list);
      }
    }

    this.byId = byId;
    this.byAlias = byAlias;
  }

  static fromDocument(document: unknown, options: RegistryOptions = {}): ElementRegistry {
    const stateId = options.stateId ?? DEFAULT_REGISTRY_STATE;
    const source = options.source ?? '<inline>';

    const parsed = RegistryDocumentSchema.safeParse(document);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      throw new RegistryFormatError(`Invalid element registry: ${detail}`, source);
    }

    const state = parsed.data.states[stateId];
    if (!state) {
      throw new RegistryFormatError(`Element registry has no state "${stateId}"`, source);
    }

    const descriptors = Object.entries(state.nodes).map(([id, node]) => toDescriptor(id, node));
    return new ElementRegistry(descriptors);
  }

  get size(): number {
    return this.byId.size;
  }

  get(id: string): ElementDescriptor | undefined {
    return this.byId.get(id);
  }

  list(): ElementDescriptor[] {
    return [...this.byId.values()];
  }

  /**
   * Exact alias match first, then whole-phrase containment in label text.
   * More than one candidate at either stage is a failure, not a guess.
   */
  resolve(symbol: ButtonSymbol): ElementDescriptor {
    const { names, labels } = SYMBOL_ALIASES[symbol];

    const exact = unique(names.flatMap((name) => this.byAlias.get(name.toLowerCase()) ?? []));
    if (exact.length === 1) return exact[0];
    if (exact.length > 1) {
      throw ambiguous(symbol, exact);
    }

    const labelled = this.list().filter((descriptor) =>
      labels.some((label) => containsPhrase(descriptor.label, label)),
    );
    if (labelled.length === 1) return labelled[0];
    if (labelled.length > 1) {
      throw ambiguous(symbol, labelled);
    }

    throw new ButtonNotFoundError(`No registry element matches button "${symbol}"`, symbol, 'missing');
  }
}

/** Maps a caller-supplied name ("plus", "*", "7 button") to a button symbol. */
export function parseButtonName(name: string): ButtonSymbol {
  const normalized = name.trim().toLowerCase().replace(BUTTON_SUFFIX, '');
  for (const symbol of BUTTON_SYMBOLS) {
    if (symbol === normalized || SYMBOL_ALIASES[symbol].names.includes(normalized)) {
      return symbol;
    }
  }
  throw new ButtonNotFoundError(`Unknown button name "${name}"`, name, 'unknown_name');
}

function toDescriptor(id: string, node: RegistryNode): ElementDescriptor {
  const iconName = node.g_icon_name.trim().toLowerCase();
  const label = node.g_brief.trim().toLowerCase();

  const aliases = new Set<string>();
  if (iconName) {
    aliases.add(iconName);
    aliases.add(iconName.replace(BUTTON_SUFFIX, ''));
  }
  if (label) aliases.add(label);

  return {
    id,
    aliases,
    label,
    iconName: node.g_icon_name,
    boundingBox: { ...node.bbox },
  };
}

function unique(descriptors: ElementDescriptor[]): ElementDescriptor[] {
  return [...new Map(descriptors.map((d) => [d.id, d])).values()];
}

function ambiguous(symbol: ButtonSymbol, candidates: ElementDescriptor[]): ButtonNotFoundError {
  const ids = candidates.map((c) => c.id);
  return new ButtonNotFoundError(
    `Button "${symbol}" matches ${ids.length} registry elements: ${ids.join(', ')}`,
    symbol,
    'ambiguous',
    ids,
  );
}

function containsPhrase(text: string, phrase: string): boolean {
  const escaped = phrase.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(^|[^\\p{L}\\p{N}])${escaped}($|[^\\p{L}\\p{N}])`, 'u').test(text);
}
