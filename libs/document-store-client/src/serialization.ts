import { errorMessage } from '@docsync/http-call-engine';
import { SerializationError } from './errors';
import type { SerializableDocument } from './types';

const encoder = new TextEncoder();
const strictDecoder = new TextDecoder('utf-8', { fatal: true });
const lenientDecoder = new TextDecoder();

export const isSerializableDocument = (value: unknown): value is SerializableDocument =>
  typeof value === 'object' &&
  value !== null &&
  'serializeToDictionary' in value &&
  typeof value.serializeToDictionary === 'function';

/**
 * Plain value for a document: its own dictionary when it provides one, otherwise the value itself.
 */
export const toDocumentValue = (document: unknown): unknown =>
  isSerializableDocument(document) ? document.serializeToDictionary() : document;

/**
 * UTF-8 JSON body for a document. Throws SerializationError for values JSON cannot represent.
 */
export function serializeDocument(document: unknown): Uint8Array {
  let json: string | undefined;
  try {
    json = JSON.stringify(toDocumentValue(document));
  } catch (error) {
    throw new SerializationError(`Failed to serialize document: ${errorMessage(error)}`, { cause: error });
  }
  if (json === undefined) {
    throw new SerializationError('Document has no JSON representation');
  }
  return encoder.encode(json);
}

/**
 * Parses a JSON response body. Empty bodies yield undefined.
 */
export function deserializeBody(body: Uint8Array): unknown {
  if (body.byteLength === 0) {
    return undefined;
  }
  let text: string;
  try {
    text = strictDecoder.decode(body);
  } catch (error) {
    throw new SerializationError('Response body is not valid UTF-8', { cause: error });
  }
  if (text.trim() === '') {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new SerializationError(`Failed to deserialize response body: ${errorMessage(error)}`, { cause: error });
  }
}

/** Best-effort text for error reports; invalid sequences become U+FFFD. */
export const decodeText = (body: Uint8Array): string => lenientDecoder.decode(body);
