import { DeclaratorMatch, MethodSignature } from '../types.js';
import { ILogger, NullLogger } from '../utils/Logger.js';

/**
 * DeclarationParser - A lexical extractor of virtual C++ member declarations.
 *
 * Works on statements rather than an AST: the text is cut at every `;`, `{`
 * and `}` and each piece is matched against a small declarator grammar. There
 * is no support for nested parentheses or balanced template arguments; anything
 * the grammar cannot read is dropped.
 */
export class DeclarationParser {
  private static readonly PATTERNS = {
    statementTerminator: /[;{}]/,
    accessSpecifier: /^\s*(?:(?:public|protected|private)\s*:(?!:)\s*)+/,
    virtualKeyword: /^\s*virtual(?!\w)\s*/,
    identifierSuffix: /\w+$/,
    returnType: /^[\w:<>,\s&*]+$/,
    qualifier: /^\s*(\w+)/,
    whitespace: /\s+/g,
    defaultValue: /\s*=\s*(?:"(?:[^"\\]|\\.)*"|'(?:[^'\\]|\\.)*'|[-+]?\s*[\w.:]+(?:\s*\()?)/g,
    commentOrLiteral: /("(?:[^"\\\n]|\\.)*"|'(?:[^'\\\n]|\\.)*')|\/\*[\s\S]*?\*\/|\/\/[^\n]*/g
  };

  private logger: ILogger;

  constructor(logger: ILogger = new NullLogger()) {
    this.logger = logger;
  }

  /**
   * Masks `//` and `/* *\/` comments with spaces. String and character literals
   * are matched in the same pass and kept as they are, so a `//` inside quotes is
   * not a comment. Line breaks are kept so line based scanning sees the same layout.
   */
  static maskComments(content: string): string {
    return content.replace(
      DeclarationParser.PATTERNS.commentOrLiteral,
      (m: string, literal: string | undefined) => literal !== undefined ? m : m.replace(/[^\n]/g, ' ')
    );
  }

  static splitStatements(text: string): string[] {
    return text.split(DeclarationParser.PATTERNS.statementTerminator);
  }

  /**
   * Match one statement against the declarator grammar:
   * `[virtual] <return type> <name>(<params>) [qualifier ...] [anything]`.
   *
   * The parameter list ends at the first `)`. The name must touch the `(` and be
   * separated from the return type by whitespace or a trailing `&`/`*`.
   */
  static matchDeclarator(statement: string): DeclaratorMatch | null {
    const { accessSpecifier, virtualKeyword, identifierSuffix, returnType, qualifier } = DeclarationParser.PATTERNS;

    let text = statement.replace(accessSpecifier, '');
    const virtualMatch = virtualKeyword.exec(text);
    const isVirtual = virtualMatch !== null;
    if (virtualMatch) {
      text = text.slice(virtualMatch[0].length);
    } else {
      text = text.trimStart();
    }

    const open = text.indexOf('(');
    if (open === -1) {
      return null;
    }
    const close = text.indexOf(')', open);
    if (close === -1) {
      return null;
    }

    const prefix = text.slice(0, open);
    const nameMatch = identifierSuffix.exec(prefix);
    if (!nameMatch) {
      return null;
    }
    const name = nameMatch[0];
    const type = prefix.slice(0, prefix.length - name.length);
    if (type.trim() === '' || !returnType.test(type)) {
      return null;
    }
    if (!/[\s&*]$/.test(type)) {
      return null;
    }

    const qualifiers: string[] = [];
    let rest = text.slice(close + 1);
    let q: RegExpExecArray | null;
    while ((q = qualifier.exec(rest)) !== null) {
      qualifiers.push(q[1]);
      rest = rest.slice(q[0].length);
    }

    return {
      isVirtual,
      returnType: type,
      name,
      parameters: text.slice(open, close + 1),
      qualifiers
    };
  }

  /**
   * Collapse whitespace, drop `= value` defaults (numbers, names, quoted
   * literals) and trim inside the parentheses.
   * A call default such as `= Bar()` loses its own `)` to the list, so a
   * dangling `(` after the value is removed with it.
   */
  static normalizeParameters(parameters: string): string {
    const { whitespace, defaultValue } = DeclarationParser.PATTERNS;
    const inner = parameters
      .slice(1, -1)
      .replace(whitespace, ' ')
      .replace(defaultValue, '')
      .trim();
    return `(${inner})`;
  }

  /**
   * Apply the mocking policy to a declarator: it must be `virtual` or already
   * `override`, must not be `final`, and leaves with `override` appended.
   */
  static toSignature(match: DeclaratorMatch): MethodSignature | null {
    const isOverride = match.qualifiers.includes('override');
    if (!match.isVirtual && !isOverride) {
      return null;
    }
    if (match.qualifiers.includes('final')) {
      return null;
    }

    return Object.freeze({
      returnType: match.returnType.replace(DeclarationParser.PATTERNS.whitespace, ' ').trim(),
      name: match.name,
      parameters: DeclarationParser.normalizeParameters(match.parameters),
      qualifiers: Object.freeze(isOverride ? [...match.qualifiers] : [...match.qualifiers, 'override'])
    });
  }

  /**
   * Signatures of every mockable declaration in `text`, in source order.
   * Each iteration re-scans the text.
   */
  extractSignatures(text: string): Iterable<MethodSignature> {
    return {
      [Symbol.iterator]: () => this.scan(text)
    };
  }

  extractSignatureList(text: string): MethodSignature[] {
    return Array.from(this.extractSignatures(text));
  }

  private *scan(text: string): Generator<MethodSignature> {
    for (const statement of DeclarationParser.splitStatements(text)) {
      if (statement.trim() === '') {
        continue;
      }

      const match = DeclarationParser.matchDeclarator(statement);
      if (!match) {
        continue;
      }

      const signature = DeclarationParser.toSignature(match);
      if (!signature) {
        this.logger.debug(`[DeclarationParser] Not mockable: ${match.name}`);
        continue;
      }

      this.logger.debug(`[DeclarationParser] Found ${signature.name}${signature.parameters}`);
      yield signature;
    }
  }
}
