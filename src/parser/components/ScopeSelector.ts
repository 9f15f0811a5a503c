import { BraceCounter } from './BraceCounter.js';
import { ILogger, NullLogger } from '../../utils/Logger.js';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Offset just past the header of `className` on `line`, or -1 when the line
 * does not open that class.
 *
 * Both `class` and the name must appear as whole identifiers, with at most one
 * word (an export macro) between them. A name followed by `;` (forward
 * declaration), `>`, `,` or `=` (template parameter), or `)`, `*` or `&`
 * (elaborated type in a parameter or variable) is not a header.
 */
function findClassHeaderEnd(line: string, className: string): number {
  const header = new RegExp(`\\bclass\\s+(?:\\w+\\s+)?${escapeRegExp(className)}(?!\\w)(?!\\s*[;>,=)*&])`);
  const match = header.exec(line);
  return match ? match.index + match[0].length : -1;
}

/**
 * Whether `line` opens the body of `className`.
 */
export function isClassOpeningLine(line: string, className: string): boolean {
  return findClassHeaderEnd(line, className) !== -1;
}

/**
 * Offset in `fragment` of the brace that takes the depth below `baseline`,
 * or -1 when the fragment never closes the scope.
 */
function findScopeEnd(fragment: string, baseline: number): number {
  let depth = baseline;
  for (let i = 0; i < fragment.length; i++) {
    if (fragment[i] === '{') {
      depth++;
    } else if (fragment[i] === '}') {
      depth--;
      if (depth < baseline) {
        return i;
      }
    }
  }
  return -1;
}

/**
 * Restrict `text` to the body of `targetClass`.
 *
 * Returns `text` unchanged when no class is given and an empty string when the
 * class is never found. The scan is line based: each line goes through the brace
 * counter before the header check, and collection stops at the first line that
 * takes the depth below the class body (that line is not included).
 */
export function selectScope(text: string, targetClass?: string, logger: ILogger = new NullLogger()): string {
  if (targetClass === undefined) {
    return text;
  }

  const counter = new BraceCounter();
  const contentOfInterest: string[] = [];
  let baseline: number | undefined;
  const lines = text.split('\n');

  for (let lineNumber = 0; lineNumber < lines.length; lineNumber++) {
    const line = lines[lineNumber];
    const depthBefore = counter.depth;
    counter.process(line);

    if (baseline === undefined) {
      const headerEnd = findClassHeaderEnd(line, targetClass);
      if (headerEnd === -1) {
        continue;
      }
      logger.debug(`[ScopeSelector] Class ${targetClass} opens on line ${lineNumber + 1}`);

      const braceIndex = line.indexOf('{', headerEnd);
      if (braceIndex === -1) {
        baseline = counter.depth + 1;
        continue;
      }

      // Braces ahead of the header (`namespace ns { class T {`) belong to enclosing scopes.
      const enclosing = new BraceCounter();
      enclosing.process(line.slice(0, braceIndex));
      baseline = depthBefore + enclosing.depth + 1;
      const tail = line.slice(braceIndex + 1);
      const end = findScopeEnd(tail, baseline);
      if (end !== -1) {
        contentOfInterest.push(tail.slice(0, end));
        break;
      }
      contentOfInterest.push(tail);
      continue;
    }

    if (counter.depth < baseline) {
      logger.debug(`[ScopeSelector] Class ${targetClass} closes on line ${lineNumber + 1}`);
      break;
    }
    contentOfInterest.push(line);
  }

  if (baseline === undefined) {
    logger.debug(`[ScopeSelector] Class ${targetClass} not found`);
  }

  return contentOfInterest.join('\n');
}
