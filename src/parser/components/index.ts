/**
 * Parser Components - Brace tracking and class scoping used ahead of
 * declaration matching.
 */

export { BraceCounter } from './BraceCounter.js';
export { selectScope, isClassOpeningLine } from './ScopeSelector.js';
