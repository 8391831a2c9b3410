/**
 * XML Encoding Error
 * Raised by an XML reader when no charset can be determined for a byte stream
 * from the BOM, the first bytes, the prolog or the HTTP content type
 */

import type { Readable } from "node:stream";

/**
 * Evidence collected before detection gave up. Each field is null when that
 * source offered nothing.
 */
export interface XmlEncodingEvidence {
  bomEncoding?: string | null;
  guessedEncoding?: string | null;
  prologEncoding?: string | null;
  contentTypeMime?: string | null;
  contentTypeEncoding?: string | null;
}

/**
 * Carries the detection evidence and the unconsumed rest of the input.
 *
 * The original stream has already been read past the detection window, so
 * callers retrying with a fallback encoding must read from `remainder`.
 */
export class XmlEncodingError extends Error {
  override readonly name = "XmlEncodingError";

  /** Encoding named by the byte-order mark */
  readonly bomEncoding: string | null;
  /** Encoding guessed from the first bytes of the stream */
  readonly guessedEncoding: string | null;
  /** Encoding declared in the XML prolog */
  readonly prologEncoding: string | null;
  /** MIME type of the content type, null when detection did not involve HTTP */
  readonly contentTypeMime: string | null;
  /** charset parameter of the content type */
  readonly contentTypeEncoding: string | null;

  constructor(
    message: string,
    evidence: XmlEncodingEvidence,
    /** Unconsumed remainder of the input */
    readonly remainder: Readable
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.bomEncoding = evidence.bomEncoding ?? null;
    this.guessedEncoding = evidence.guessedEncoding ?? null;
    this.prologEncoding = evidence.prologEncoding ?? null;
    this.contentTypeMime = evidence.contentTypeMime ?? null;
    this.contentTypeEncoding = evidence.contentTypeEncoding ?? null;
  }
}
