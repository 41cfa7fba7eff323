export { DEFAULT_DELIMITERS, createDelimiters, isDelimited, addDelimiters, removeDelimiters } from './delimiters';
export type { Delimiters } from './delimiters';
export { parseRuns, withText, hasText, runText, runTextStart, runTextEnd } from './runs';
export type { Run, TextRun, RunText, TagPosition, DocumentRuns } from './runs';
export { Placeholder, parsePlaceholders, fragmentValid, formatDiagnostic } from './placeholder';
export type { Position, RunRef, Fragment, Diagnostic, DiagnosticKind, ParseResult } from './placeholder';
export { replacePlaceholders } from './replace';
export { escapeXml, unescapeXml } from './xml';
export type { PlaceholderMap, PlaceholderValue, ReplaceResult } from './replace';
export { findPlaceholders, fillTemplate, templatePartPaths } from './docx';
export type { TemplateOptions, PartPlaceholders, FindResult, FillResult } from './docx';
