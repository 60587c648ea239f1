export { isString, hasMessage, errorMessage } from "./type-guards";
export { type AnySchema, parseJsonWith } from "./parse";
export { type Result, Ok, Err, settle, unwrap } from "./result";
