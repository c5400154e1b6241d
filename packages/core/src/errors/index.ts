const DISABLE_STACKTRACE : boolean = true;

export class XorError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name  = new.target.name;
    if (DISABLE_STACKTRACE) this.stack = undefined;
  }
}

export class IoError     extends XorError {}
export class ConfigError extends XorError {}

/** Argument or file-access problem detected before the engine runs. */
export class UsageError extends XorError {
  constructor(message: string, readonly showHelpHint = false) {
    super(message);
  }
}

/** Cooperative cancellation; `exitCode` is the status the process ends with. */
export class AbortedError extends XorError {
  constructor(message = 'aborted', readonly exitCode = 130) {
    super(message);
  }
}
