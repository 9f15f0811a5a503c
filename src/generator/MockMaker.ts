import { MethodSignature, MockMakerOptions } from '../types.js';
import { DEFAULT_REAL_INSTANCE_NAME } from '../constants.js';
import { DeclarationParser } from '../parser/DeclarationParser.js';
import { selectScope } from '../parser/components/index.js';
import { ILogger, NullLogger } from '../utils/Logger.js';
import { formatDefaultDelegation, formatMockMethod } from './mockFormatter.js';

/**
 * Makes the body of a googletest mock class from a C++ header or snippet.
 *
 * Usage:
 * ```typescript
 * const maker = new MockMaker({ targetClass: 'Widget' });
 * const body = maker.makeMock(headerText);
 * ```
 */
export class MockMaker {
  readonly targetClass?: string;
  readonly delegate: boolean;
  readonly realInstanceName: string;
  private logger: ILogger;
  private parser: DeclarationParser;

  constructor(options: MockMakerOptions = {}, logger: ILogger = new NullLogger()) {
    this.targetClass = options.targetClass;
    this.delegate = options.delegate ?? false;
    this.realInstanceName = options.realInstanceName ?? DEFAULT_REAL_INSTANCE_NAME;
    this.logger = logger;
    this.parser = new DeclarationParser(logger);
  }

  findMethodsToMock(content: string): MethodSignature[] {
    const masked = DeclarationParser.maskComments(content);
    const scoped = selectScope(masked, this.targetClass, this.logger);
    return this.parser.extractSignatureList(scoped);
  }

  /**
   * One `MOCK_METHOD` line per method, then the `ON_CALL` lines when delegation
   * is on. Empty when nothing is mockable.
   */
  makeMock(content: string): string {
    const methods = this.findMethodsToMock(content);
    this.logger.info(`[MockMaker] ${methods.length} method(s) to mock`);

    const lines = methods.map(formatMockMethod);
    if (this.delegate) {
      lines.push(...methods.map(m => formatDefaultDelegation(m, this.realInstanceName)));
    }
    return lines.join('\n');
  }
}
