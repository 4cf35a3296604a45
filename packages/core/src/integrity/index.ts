export { checkTransferIntegrity, validateTransferIntegrity } from "./transfer-integrity.js";
