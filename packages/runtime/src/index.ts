export {
  DatabaseError,
  NotFoundError,
  UnsafeMutationError,
  ValidationError,
  isQueryError,
  toDatabaseError,
  type MutationKind,
  type QueryError,
} from "./errors.js"
export { systemValue, toArray, type QueryContext } from "./context.js"
