export type BuildMode = 'personal' | 'public';

export interface FileRecord {
  /** Path relative to the source root, always with forward slashes. */
  relPath: string;
  absPath: string;
  size: number;
}

export interface SelectionRules {
  /** Top-level directory names that may be descended into. */
  allow: string[];
  /** fnmatch-style globs tested against the relative path. */
  exclude: string[];
  /** Size ceiling in bytes; 0 disables it. */
  maxBytes: number;
  nocase?: boolean;
}

export interface SelectionResult {
  included: FileRecord[];
  oversized: FileRecord[];
  excluded: number;
  // files that could not be stat'd and directories that could not be listed
  unreadable: string[];
  totalBytes: number;
}

export interface BuildInfo {
  name: string;
  version: string;
  created: string;
  creator?: string;
  description: string;
}

export interface RedactionRule {
  pattern: string;
  replacement: string;
  flags?: string;
}

export interface RedactionTarget {
  name: string;
  files: string[];
  rules: RedactionRule[];
}

export interface RedactionProfile {
  description: string;
  exclude: string[];
  targets: RedactionTarget[];
}

export interface BuildOptions {
  kodiDir: string;
  outDir: string;
  name: string;
  allow: string[];
  exclude: string[];
  maxBytes: number;
  mode: BuildMode;
  preview: boolean;
  buildInfo: boolean;
  version: string;
  description: string;
  creator?: string;
  // JSON profile used in public mode; the bundled preset when omitted
  redactionProfile?: string;
  nocase?: boolean;
  now?: Date;
}

export interface RedactedFile {
  relPath: string;
  target: string;
  replacements: number;
}

export interface PreviewOutcome {
  kind: 'preview';
  selection: SelectionResult;
  // files a public build would rewrite; replacement counts are not computed in preview
  redacted: RedactedFile[];
}

export interface ArchiveOutcome {
  kind: 'archive';
  zipPath: string;
  archiveBytes: number;
  selection: SelectionResult;
  redacted: RedactedFile[];
  // redaction targets left out because they could not be read
  dropped: string[];
}

export type BuildOutcome = PreviewOutcome | ArchiveOutcome;
