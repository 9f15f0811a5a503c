/**
 * Shared types for declaration parsing and mock generation.
 */

/**
 * A virtual method declaration accepted for mocking.
 * Produced once per accepted declaration and never mutated afterwards.
 */
export interface MethodSignature {
  readonly returnType: string;
  readonly name: string;
  /** Parenthesized, default values stripped, single-spaced. */
  readonly parameters: string;
  /** Always contains `override` exactly once, never `final`. */
  readonly qualifiers: readonly string[];
}

/**
 * Raw result of matching one statement against the declarator grammar,
 * before the acceptance policy is applied.
 */
export interface DeclaratorMatch {
  isVirtual: boolean;
  returnType: string;
  name: string;
  /** Parameter list as written, including both parentheses. */
  parameters: string;
  qualifiers: string[];
}

/**
 * One parameter recovered from a signature's parameter list for delegation.
 */
export interface DelegationParameter {
  type: string;
  name: string;
}

/**
 * Options accepted by the mock generator.
 */
export interface MockMakerOptions {
  targetClass?: string;
  delegate?: boolean;
  realInstanceName?: string;
}
