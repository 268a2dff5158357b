export * from "./query-ir.js"
export {
  QueryDocument,
  decodeQueryDocument,
  parseQueryDocument,
  toQueryDefinition,
} from "./document.js"
