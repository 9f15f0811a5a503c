/**
 * Public API of makemock.
 */

export { MockMaker } from './generator/MockMaker.js';
export { formatMockMethod, formatDefaultDelegation, parseDelegationParameters } from './generator/mockFormatter.js';
export { DeclarationParser } from './parser/DeclarationParser.js';
export { BraceCounter, selectScope, isClassOpeningLine } from './parser/components/index.js';
export { LoggerService, NullLogger, LogLevel } from './utils/Logger.js';
export type { ILogger, LogSink } from './utils/Logger.js';
export { UsageError } from './utils/errors.js';
export type { MethodSignature, DeclaratorMatch, DelegationParameter, MockMakerOptions } from './types.js';
