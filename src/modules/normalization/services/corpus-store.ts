import { CleanedDocument } from "../../../core/records";

export type AdmitResult =
  | { admitted: true }
  | { admitted: false; duplicateOf: string };

/**
 * Working corpus for one run. Check-and-insert on the fingerprint set is a
 * single synchronous step, so concurrent callers on the event loop can
 * never both admit the same fingerprint. Append-only until closed.
 */
export class CorpusStore {
  private readonly byFingerprint = new Map<string, string>();
  private readonly admitted: CleanedDocument[] = [];
  private closed = false;

  get size(): number {
    return this.admitted.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  admit(document: CleanedDocument): AdmitResult {
    if (this.closed) {
      throw new Error("Corpus is closed; no further documents can be admitted");
    }
    const existing = this.byFingerprint.get(document.fingerprint);
    if (existing !== undefined) {
      return { admitted: false, duplicateOf: existing };
    }
    this.byFingerprint.set(document.fingerprint, document.id);
    this.admitted.push(document);
    return { admitted: true };
  }

  /**
   * Declares the corpus closed and returns it in admission order
   */
  close(): readonly CleanedDocument[] {
    this.closed = true;
    return [...this.admitted];
  }
}

/**
 * Admits documents in order into a fresh store and returns the survivors
 */
export function dedupeDocuments(
  documents: Iterable<CleanedDocument>,
): CleanedDocument[] {
  const store = new CorpusStore();
  for (const document of documents) {
    store.admit(document);
  }
  return [...store.close()];
}
