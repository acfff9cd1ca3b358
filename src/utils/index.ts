export { createDiagnosticsLog, type DiagnosticsLog } from "./diagnostics-log";
export { handleError, type HandleErrorParams } from "./handle-error";
export { Err, Ok, type Result, safeTry } from "./result";
export {
  type BodyInput,
  cancelledError,
  raceAbort,
  toAsyncIterable,
} from "./stream";
