import { readFile } from 'node:fs/promises';
import { RegistryFormatError } from '../exception/errors.js';
import { ElementRegistry } from './element-registry.js';

export async function loadElementRegistry(path: string, stateId?: string): Promise<ElementRegistry> {
  const raw = await readFile(path, 'utf-8');

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RegistryFormatError(`Element registry is not valid JSON: ${reason}`, path);
  }

  return ElementRegistry.fromDocument(document, { stateId, source: path });
}
