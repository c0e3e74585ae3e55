/**
 * Errors Module
 */

export {
  GraphError,
  NotFoundError,
  DanglingReferenceError,
  ReferentialIntegrityError,
  PropertyTypeError,
  StorageError,
  StaleEntityError,
  GraphClosedError,
  ConfigurationError,
  toError,
} from "./errors"
