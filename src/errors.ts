export class MissingInputError extends Error {
  constructor(public readonly filePath: string) {
    super(`Content file not found: ${filePath}`);
    this.name = 'MissingInputError';
  }
}

export class UnrecognizedRoleError extends Error {
  constructor(public readonly section: string, public readonly token: string) {
    super(`Unrecognized role heading "${token}" in section "${section}"`);
    this.name = 'UnrecognizedRoleError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
