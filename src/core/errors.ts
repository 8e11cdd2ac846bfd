/**
 * Errors — Structural failures surfaced to the caller.
 *
 * Live numeric conditions (division by zero, runaway resonance, unconnected
 * inputs) never raise; they are clamped or defaulted where they occur.
 */

export class PatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ModuleNotFoundError extends PatchError {
  constructor(readonly moduleName: string) {
    super(`Module "${moduleName}" is not registered`);
  }
}

export class DuplicateNameError extends PatchError {
  constructor(readonly duplicate: string, what = 'Module') {
    super(`${what} "${duplicate}" already exists`);
  }
}

export class PortNotFoundError extends PatchError {
  constructor(
    readonly moduleName: string,
    readonly portName: string,
    direction: 'input' | 'output'
  ) {
    super(`Module "${moduleName}" has no ${direction} port "${portName}"`);
  }
}

export class PortDirectionError extends PatchError {
  constructor(
    readonly moduleName: string,
    readonly portName: string,
    expected: 'input' | 'output'
  ) {
    super(`Port "${moduleName}.${portName}" is not an ${expected}`);
  }
}

export class SignalTypeMismatchError extends PatchError {
  constructor(message: string) {
    super(message);
  }
}

export class InvalidParameterError extends PatchError {
  constructor(
    readonly moduleName: string,
    readonly parameter: string,
    reason: string
  ) {
    super(`Invalid parameter "${parameter}" on "${moduleName}": ${reason}`);
  }
}

export class StateError extends PatchError {
  constructor(message: string) {
    super(message);
  }
}
