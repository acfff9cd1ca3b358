export { extractBoundary, validateBoundary } from "./boundary";
export {
  decodeExtValue,
  parseParameterizedValue,
  parsePartHeaders,
} from "./headers";
export { BoundaryScanner } from "./scanner";
export type {
  HeaderParserOptions,
  PartHeaders,
  ScanEvent,
  ScannerOptions,
} from "./types";
