/**
 * Library entry point: read text of unknown encoding as BOM-free UTF-8.
 */

export {
  BOMS,
  type BomDescriptor,
  charsetFromMetaContent,
  determineEncoding,
  Encoding,
  type EncodingResolution,
  lookup,
  matchBom,
  prescan,
  type ResolutionSource,
  supportedEncodings,
} from "./encoding";
export {
  type ByteSource,
  createOutputFile,
  createReader,
  mustOpenFile,
  normalize,
  type OpenedFile,
  openFile,
  type OutputFile,
  readAll,
  type TextReader,
} from "./reader";
export { DEFAULT_LOOKAHEAD_BYTES, type ReaderOptions } from "./utils/config";
export {
  ConfigurationError,
  DecodeError,
  FatalError,
  SinkWriteError,
  SourceReadError,
  TextNormError,
} from "./utils/errors";
