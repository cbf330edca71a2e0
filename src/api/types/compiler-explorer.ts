/** A language known to the Compiler Explorer instance. */
export interface Language {
  id: string;
  name: string;
  /** File extensions including the leading dot, e.g. ".cpp". */
  extensions: string[];
  monaco?: string;
}

export interface Compiler {
  id: string;
  name: string;
  lang: string;
  compilerType?: string;
  semver?: string;
  /** Instruction set of the generated code, e.g. "amd64". Used for opcode documentation. */
  instructionSet?: string | null;
}

export interface SourceLocation {
  file: string | null;
  line: number | null;
  column?: number | null;
}

/** One line of compiler output. `source` is null for labels, directives and the like. */
export interface AsmLine {
  text: string;
  source: SourceLocation | null;
}

export interface OutputTag {
  line: number;
  column: number;
  text: string;
  /** 3 = error, 2 = warning, 1 = information. */
  severity?: number;
}

export interface OutputLine {
  text: string;
  tag?: OutputTag;
}

export interface CompileRequest {
  source: string;
  lang: string;
  userArguments: string;
}

export interface CompileResponse {
  code: number;
  asm: AsmLine[];
  stdout: OutputLine[];
  stderr: OutputLine[];
}

export interface Formatter {
  exe: string;
  name: string;
  styles: string[];
  type: string;
  version: string;
}

export interface FormatResponse {
  answer: string;
  exit: number;
}

export interface InstructionDocumentation {
  tooltip: string;
  html: string;
  url: string;
}
