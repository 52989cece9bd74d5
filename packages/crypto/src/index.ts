export { computeDocumentId } from "./document-id.js";
