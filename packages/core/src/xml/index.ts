export { XmlEncodingError } from "./encoding-error.js";
export type { XmlEncodingEvidence } from "./encoding-error.js";
