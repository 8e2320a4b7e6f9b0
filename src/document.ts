import type { AbcDocument, InformationField, MusicEvent, ParseDiagnostic } from './types';
import { assertValidHeader } from './validator';
import { propagateKeySignature } from './key-signature';
import { generateId } from './id';

/**
 * Assemble a document from a validated header and folded events.
 * The key signature is applied here, once. The document holds its own copies
 * of the field and event lists; note events are rewritten in place.
 */
export function createDocument(
  fields: InformationField[],
  events: MusicEvent[],
  diagnostics: ParseDiagnostic[] = []
): AbcDocument {
  assertValidHeader(fields);

  const ownFields = [...fields];
  const ownEvents = [...events];
  const key = ownFields.find(f => f.key === 'K');
  propagateKeySignature(ownEvents, key?.value);

  return { _id: generateId(), fields: ownFields, events: ownEvents, diagnostics: [...diagnostics] };
}
