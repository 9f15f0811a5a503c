import { DEFAULT_REAL_INSTANCE_NAME } from '../constants.js';
import { LogLevel } from '../utils/Logger.js';
import { UsageError } from '../utils/errors.js';

export interface MakeMockConfig {
  targetClass?: string;
  delegate: boolean;
  realInstanceName: string;
  logLevel: LogLevel;
}

const DEFAULT_CONFIG: MakeMockConfig = {
  targetClass: undefined,
  delegate: false,
  realInstanceName: DEFAULT_REAL_INSTANCE_NAME,
  logLevel: LogLevel.WARN
};

/**
 * Options as they come out of the command-line parser.
 */
export interface IMakeMockCliOptions {
  targetClass?: string;
  delegate?: boolean;
  real?: string;
  verbose?: boolean;
}

const IDENTIFIER = /^[A-Za-z_]\w*$/;

export class ConfigurationManager {
  private config: MakeMockConfig;

  constructor() {
    this.config = { ...DEFAULT_CONFIG };
  }

  getConfig(): MakeMockConfig {
    return { ...this.config };
  }

  /**
   * @throws UsageError when `real` is not a C++ identifier
   */
  updateFromCliOptions(opts: Partial<IMakeMockCliOptions> | null | undefined): void {
    if (!opts) {return;}

    if (typeof opts.targetClass === 'string' && opts.targetClass.trim() !== '') {
      this.config.targetClass = opts.targetClass.trim();
    }
    if (typeof opts.delegate === 'boolean') {
      this.config.delegate = opts.delegate;
    }
    if (typeof opts.real === 'string') {
      if (!IDENTIFIER.test(opts.real)) {
        throw new UsageError(`Invalid value for "--real": "${opts.real}" is not an identifier.`);
      }
      this.config.realInstanceName = opts.real;
    }
    if (opts.verbose === true) {
      this.config.logLevel = LogLevel.DEBUG;
    }
  }
}
