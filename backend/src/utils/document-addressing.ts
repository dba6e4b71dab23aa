/**
 * Deterministic document addressing: identifiers and object keys are always
 * recomputed from the transaction and category, never looked up.
 */

import { v5 as uuidv5 } from 'uuid';

// RFC 4122 name space for ISO OIDs
export const DOCUMENT_ID_NAMESPACE = '6ba7b812-9dad-11d1-80b4-00c04fd430c8';

export function deriveDocumentId(transactionId: string, docCatCode: string): string {
  return uuidv5(transactionId + docCatCode, DOCUMENT_ID_NAMESPACE);
}

export function buildObjectKey(transactionId: string, documentId: string): string {
  return `${transactionId}/${documentId}`;
}

/**
 * Extension after the last dot, or null when the name has no base name and
 * extension on both sides of it ("report", ".env", "scan.").
 */
export function deriveFileFormat(fileName: string): string | null {
  const separator = fileName.lastIndexOf('.');
  if (separator <= 0 || separator === fileName.length - 1) {
    return null;
  }
  return fileName.substring(separator + 1);
}
