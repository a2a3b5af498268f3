export {
  Entity,
  Profile,
  type Readable,
  type DocumentListing,
} from "./entity.js";
export { Author } from "./author.js";
export { Affiliation } from "./affiliation.js";
export { Document } from "./document.js";
export {
  PAYLOAD_KEYS,
  normalizePayload,
  fetchPayload,
  readEntityPayload,
  fetchDocumentsPage,
  readDocumentList,
  documentsUri,
  type PayloadKey,
  type EntityPayload,
  type DocumentsPage,
} from "./payload.js";
