/**
 * Formatters turning accepted signatures into googletest statements.
 */

import { DelegationParameter, MethodSignature } from '../types.js';
import { DEFAULT_REAL_INSTANCE_NAME, MATCH_ANY_PLACEHOLDER } from '../constants.js';

const PARAMETER_PATTERN =
  /^\s*(?<type>(?:const\s+)?[:\w]+(?:\s*<[^()]*>)?(?:\s*[*&])?)\s*(?<name>\w+)?\s*(?:=\s*0)?\s*$/;

/**
 * `MOCK_METHOD(<return type>, <name>, <parameters>, (<qualifiers>));`
 */
export function formatMockMethod(signature: MethodSignature): string {
  return (
    `MOCK_METHOD(${signature.returnType}, ${signature.name}, ` +
    `${signature.parameters}, (${signature.qualifiers.join(', ')}));`
  );
}

/**
 * Split on commas that are not inside `<...>`.
 */
export function splitTopLevel(list: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < list.length; i++) {
    const char = list[i];
    if (char === '<') {
      depth++;
    } else if (char === '>' && depth > 0) {
      depth--;
    } else if (char === ',' && depth === 0) {
      parts.push(list.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(list.slice(start));
  return parts;
}

/**
 * Recover `type name` pairs from a parameter list. Parameters the pattern
 * cannot read are left out; unnamed ones are called `p<position>` after their
 * position in the original list.
 */
export function parseDelegationParameters(parameters: string): DelegationParameter[] {
  const result: DelegationParameter[] = [];
  const inner = parameters.replace(/^\s*\(/, '').replace(/\)\s*$/, '');

  splitTopLevel(inner).forEach((raw, index) => {
    const match = PARAMETER_PATTERN.exec(raw);
    if (!match?.groups) {
      return;
    }
    const type = match.groups['type'];
    const name = match.groups['name'];
    if (type === undefined) {
      return;
    }
    result.push({ type, name: name ?? `p${index}` });
  });

  return result;
}

/**
 * `ON_CALL` statement making the mock forward each call to a real instance by default.
 */
export function formatDefaultDelegation(
  signature: MethodSignature,
  realInstanceName: string = DEFAULT_REAL_INSTANCE_NAME
): string {
  const parameters = parseDelegationParameters(signature.parameters);
  const placeholders = parameters.map(() => MATCH_ANY_PLACEHOLDER).join(', ');
  const typedParameters = parameters.map(p => `${p.type} ${p.name}`).join(', ');
  const names = parameters.map(p => p.name).join(', ');
  const body = `{ return ${realInstanceName}->${signature.name}(${names}); }`;

  return (
    `ON_CALL(*this, ${signature.name}(${placeholders}))` +
    `.WillByDefault(Invoke([](${typedParameters}) ${body}));`
  );
}
