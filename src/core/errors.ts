export class InvalidRangeError extends Error {
  constructor(message = 'Start date must be before end date') {
    super(message);
    this.name = 'InvalidRangeError';
  }
}

export class InvalidWeightsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidWeightsError';
  }
}

export class InvalidDateError extends Error {
  constructor(readonly input: string) {
    super(`Unrecognized date: "${input}"`);
    this.name = 'InvalidDateError';
  }
}

export class InvalidSettingsError extends Error {
  constructor(readonly file: string, details: string) {
    super(`Invalid settings in ${file}: ${details}`);
    this.name = 'InvalidSettingsError';
  }
}

export class NotAGitRepositoryError extends Error {
  constructor(readonly repoPath: string) {
    super(`${repoPath} is not a git repository`);
    this.name = 'NotAGitRepositoryError';
  }
}

export class UnknownHolidayCountryError extends Error {
  constructor(readonly country: string) {
    super(`Unknown holiday country: ${country}`);
    this.name = 'UnknownHolidayCountryError';
  }
}
