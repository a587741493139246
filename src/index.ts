export * from './errors';
export { loadConfig, ConfigSchema, ENV_PREFIX } from './config';
export type { Config, ConfigInput, ColumnNames } from './config';
export { createLogger, LOGGER_NAME } from './logger';
export type { Logger } from './logger';
export * from './models';
export * from './utils/directiveCodes';
export { parseAtomLine, formatAtomLine, formatNumber, wrapInstruction } from './io/isl/atomLine';
export type { AtomLine } from './io/isl/atomLine';
export { InstructionReader, UNSUPPORTED_KEYWORDS, instructionKeyword, scatteringTypes } from './io/isl/instructionReader';
export type {
  IslLine,
  DirectiveLine,
  AtomInstructionLine,
  OpaqueInstructionLine,
} from './io/isl/instructionReader';
export { DirectiveStack } from './io/isl/directiveStack';
export type { DirectiveFrame, Placement } from './io/isl/directiveStack';
export { StreamDecoder } from './io/isl/streamDecoder';
export type { AtomTypeLookup, DecodeResult, StreamDecoderOptions } from './io/isl/streamDecoder';
export { GraphEncoder, DEFAULT_LINE_WIDTH } from './io/isl/graphEncoder';
export type { GraphEncoderOptions } from './io/isl/graphEncoder';
export { CIFParser, parseCifNumber } from './io/parsers/cifParser';
export { ConstraintConverter, deriveScatteringTypes } from './io/constraintConverter';
export type { BlockConversion, ConstraintConverterOptions } from './io/constraintConverter';
