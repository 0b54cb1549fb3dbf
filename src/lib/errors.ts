export class BuildError extends Error {
  constructor(
    readonly title: string,
    readonly detail: string,
    readonly hint?: string,
    options?: { cause?: unknown }
  ) {
    super(`${title}: ${detail}`, options);
    this.name = new.target.name;
  }

  format(): string {
    const lines = [`ERROR: ${this.title}`, '', `   ${this.detail}`];
    if (this.hint) lines.push('', `   Hint: ${this.hint}`);
    return lines.join('\n');
  }
}

export class PathNotFoundError extends BuildError {
  constructor(readonly path: string) {
    super(
      'Kodi folder not found',
      `"${path}" does not exist or is not a directory.`,
      'Make sure Kodi has been run at least once, or pass the folder explicitly (kbuild build <dir>).'
    );
  }
}

export class ArchiveWriteError extends BuildError {
  constructor(readonly zipPath: string, cause: unknown) {
    super(
      'Could not write build archive',
      `${zipPath}: ${cause instanceof Error ? cause.message : String(cause)}`,
      'The incomplete archive was deleted. Check free space and permissions on the output folder.',
      { cause }
    );
  }
}

export class ConfigError extends BuildError {
  constructor(readonly file: string, reason: string) {
    super('Invalid configuration', `${file}: ${reason}`);
  }
}

export function describeError(e: unknown): string {
  if (e instanceof BuildError) return e.format();
  if (e instanceof Error) return e.message;
  return String(e);
}
