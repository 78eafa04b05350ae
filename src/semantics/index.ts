export * from "./typenames.js";
export { isJavaKeyword, RESERVED_ARGUMENT_PREFIX } from "./keywords.js";
export { resolveDocumentTypes, referencedTypes } from "./resolve-types.js";
export { bindDocumentReferences } from "./bind-references.js";
export { checkDocument, type CheckResult } from "./check-document.js";
