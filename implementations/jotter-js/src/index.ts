export { Document } from "./document.js";
export type { ContainerOptions, DocumentOptions, MarshalOptions } from "./document.js";
export { Sequence } from "./sequence.js";
export { parse, parseDocument, parseSequence, Parser, DEFAULT_MAX_DEPTH } from "./parser.js";
export type { ParseOptions } from "./parser.js";
export { Lexer, tokenize, isLiteral, DEFAULT_MAX_INPUT_LENGTH } from "./lexer.js";
export type { Token, TokenKind, LiteralToken, LexerOptions } from "./lexer.js";
export { toValue, isContainer } from "./coerce.js";
export { CompactFormatter, PrettyFormatter, escapeString, formatDouble } from "./formatter.js";
export type { Formatter, FormatterFactory, PrettyFormatterOptions } from "./formatter.js";
export { MappingRegistry, accessorKey } from "./registry.js";
export type {
  Constructor,
  ElementType,
  FieldBinding,
  FieldDeclaration,
  MemberStyle,
  TypeDeclaration,
  TypeMapping,
} from "./registry.js";
export { mapObject, documentToObject, sequenceToArray } from "./mapper.js";
export type { MapperOptions, FieldOutcome, FieldStatus, MappingResult, ElementOf } from "./mapper.js";
export { SortedStore } from "./store.js";
export type { EntryStore } from "./store.js";
export { readDocument, readSequence } from "./file.js";
export { toSexp, errorToSexp } from "./sexp.js";
export {
  JotterError,
  ArgumentError,
  ParseError,
  TypeMismatchError,
  MappingError,
  NestedArrayError,
} from "./errors.js";
export { INT32_MIN, INT32_MAX, INT64_MIN, INT64_MAX, unwrap } from "./types.js";
export type { Value, Scalar, RawValue, ValueType, Span } from "./types.js";
