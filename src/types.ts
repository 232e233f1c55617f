export type FileType = "PDF" | "DOCX" | "TXT" | "MD" | "IMAGE";

export interface FileEntry {
  /** Path relative to the scanned root, always `/`-separated. */
  readonly path: string;
  readonly type: FileType;
  readonly size: number;
  readonly preview: string;
}

export interface ExtractionWarning {
  path: string;
  message: string;
}

export interface ExtractionResult {
  entries: FileEntry[];
  warnings: ExtractionWarning[];
}

/** An unquoted glob in a planned command, expanded when the command runs. */
export interface GlobArg {
  glob: string;
}

export type CommandArg = string | GlobArg;

export interface PlannedCommand {
  text: string;
  args: CommandArg[];
}

export type Plan = PlannedCommand[];

export interface ExecutionResult {
  command: string;
  argv: string[];
  exitCode: number | null;
  stdout: string;
  stderr: string;
  error?: string;
}

export interface ExecutionReport {
  results: ExecutionResult[];
  failed?: ExecutionResult;
  notRun: PlannedCommand[];
}

export type ReviewState = "awaiting_confirmation" | "approved" | "rejected";

export type AskFn = (question: string) => Promise<string>;
