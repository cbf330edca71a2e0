import axios from "axios";
import {
  COMPILE_ENDPOINT,
  COMPILERS_ENDPOINT,
  FORMAT_ENDPOINT,
  FORMATTERS_ENDPOINT,
  INSTRUCTION_DOC_ENDPOINT,
  LANGUAGES_ENDPOINT,
} from "./types/endpoints";
import {
  AsmLine,
  Compiler,
  CompileRequest,
  CompileResponse,
  Formatter,
  FormatResponse,
  InstructionDocumentation,
  Language,
} from "./types/compiler-explorer";
import { ApiResult } from "./types/result";
import { getExtensionConfig } from "../config/extension-config";
import { errorMessage } from "../utils";

const JSON_HEADERS = {
  Accept: "application/json",
  "Content-Type": "application/json",
};

const requestOptions = () => ({
  headers: JSON_HEADERS,
  timeout: getExtensionConfig().requestTimeoutMs,
});

/**
 * Builds the message shown to the user for a failed request.
 *
 * Prefers what the service itself said (plain-text body or a JSON `message`)
 * over the transport-level message.
 */
export function describeRequestError(err: unknown): string {
  if (typeof err === "object" && err !== null && "response" in err) {
    const response = err.response;
    if (typeof response === "object" && response !== null && "data" in response) {
      const data = response.data;
      if (typeof data === "string" && data.trim() !== "") {
        return data.trim();
      }
      if (
        typeof data === "object" &&
        data !== null &&
        "message" in data &&
        typeof data.message === "string"
      ) {
        return data.message;
      }
    }
  }
  return errorMessage(err);
}

async function getJson<T>(url: string, what: string): Promise<ApiResult<T>> {
  try {
    console.log(`[CompilerExplorerApi] GET ${url}`);
    const response = await axios.get<T>(url, requestOptions());
    return { data: response.data };
  } catch (err) {
    console.error(`[CompilerExplorerApi] Failed to fetch ${what}:`, err);
    return { error: `Failed to fetch ${what}: ${describeRequestError(err)}` };
  }
}

/**
 * Fetches the languages supported by the service.
 */
export async function getLanguages(): Promise<ApiResult<Language[]>> {
  const { data, error } = await getJson<unknown>(LANGUAGES_ENDPOINT(), "languages");
  if (error !== undefined) {
    return { error };
  }
  if (!Array.isArray(data)) {
    return { error: "Invalid response: expected a list of languages" };
  }
  return { data: collect(data, toLanguage) };
}

/**
 * Fetches the compilers available for a language.
 *
 * @param languageId - The language id, e.g. "c++".
 */
export async function getCompilers(languageId: string): Promise<ApiResult<Compiler[]>> {
  const { data, error } = await getJson<unknown>(COMPILERS_ENDPOINT(languageId), "compilers");
  if (error !== undefined) {
    return { error };
  }
  if (!Array.isArray(data)) {
    return { error: "Invalid response: expected a list of compilers" };
  }
  return { data: collect(data, toCompiler) };
}

/**
 * Fetches the formatters available on the service.
 */
export async function getFormatters(): Promise<ApiResult<Formatter[]>> {
  const { data, error } = await getJson<unknown>(FORMATTERS_ENDPOINT(), "formatters");
  if (error !== undefined) {
    return { error };
  }
  if (!Array.isArray(data)) {
    return { error: "Invalid response: expected a list of formatters" };
  }
  return { data: collect(data, toFormatter) };
}

/**
 * Looks up the documentation of an instruction.
 *
 * @param instructionSet - The compiler's instruction set, e.g. "amd64".
 * @param opcode - The mnemonic under the cursor.
 */
export async function getInstructionDocumentation(
  instructionSet: string,
  opcode: string
): Promise<ApiResult<InstructionDocumentation>> {
  return getJson<InstructionDocumentation>(
    INSTRUCTION_DOC_ENDPOINT(instructionSet, opcode),
    `documentation for ${opcode}`
  );
}

/**
 * Builds the body of a compile request: Intel syntax, demangled, with
 * comments, directives, labels and library code filtered out.
 */
export function createCompileBody(request: CompileRequest) {
  return {
    source: request.source,
    lang: request.lang,
    options: {
      userArguments: request.userArguments,
      compilerOptions: {
        skipAsm: false,
        executorRequest: false,
      },
      filters: {
        binary: false,
        commentOnly: true,
        demangle: true,
        directives: true,
        execute: false,
        intel: true,
        labels: true,
        libraryCode: true,
        trim: false,
      },
      tools: [],
      libraries: [],
    },
    allowStoreCodeDebug: true,
  };
}

/**
 * Compiles source text with the given compiler.
 *
 * A service or network failure comes back as `error`, never as an empty result.
 */
export async function postCompile(
  compilerId: string,
  request: CompileRequest
): Promise<ApiResult<CompileResponse>> {
  const url = COMPILE_ENDPOINT(compilerId);
  try {
    console.log(`[CompilerExplorerApi] POST ${url}`);
    const response = await axios.post<Partial<CompileResponse>>(
      url,
      createCompileBody(request),
      requestOptions()
    );
    const body = response.data;
    if (!isRecord(body) || !Array.isArray(body.asm)) {
      return { error: "Invalid response: compile result has no assembly" };
    }
    return {
      data: {
        code: typeof body.code === "number" ? body.code : 0,
        asm: body.asm.map(normalizeAsmLine),
        stdout: Array.isArray(body.stdout) ? body.stdout : [],
        stderr: Array.isArray(body.stderr) ? body.stderr : [],
      },
    };
  } catch (err) {
    console.error("[CompilerExplorerApi] Compile request failed:", err);
    return { error: describeRequestError(err) };
  }
}

export function createFormatBody(source: string, style: string) {
  return {
    source,
    base: style,
    useSpaces: true,
    tabWidth: 4,
  };
}

/**
 * Formats source text with the given formatter and style.
 */
export async function postFormat(
  formatterType: string,
  source: string,
  style: string
): Promise<ApiResult<FormatResponse>> {
  const url = FORMAT_ENDPOINT(formatterType);
  try {
    console.log(`[CompilerExplorerApi] POST ${url}`);
    const response = await axios.post<FormatResponse>(
      url,
      createFormatBody(source, style),
      requestOptions()
    );
    const body = response.data;
    if (!isRecord(body) || typeof body.answer !== "string") {
      return { error: "Invalid response: format result has no answer" };
    }
    return { data: { answer: body.answer, exit: typeof body.exit === "number" ? body.exit : 0 } };
  } catch (err) {
    console.error("[CompilerExplorerApi] Format request failed:", err);
    return { error: describeRequestError(err) };
  }
}

function normalizeAsmLine(line: AsmLine): AsmLine {
  return {
    text: typeof line.text === "string" ? line.text : "",
    source: line.source ?? null,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const optionalString = (value: unknown): string | undefined =>
  typeof value === "string" ? value : undefined;

/**
 * Normalizes catalog entries, dropping those that are not objects or that
 * `normalize` rejects.
 */
function collect<T>(entries: unknown[], normalize: (entry: Record<string, unknown>) => T | undefined): T[] {
  const items: T[] = [];
  for (const entry of entries) {
    const item = isRecord(entry) ? normalize(entry) : undefined;
    if (item !== undefined) {
      items.push(item);
    }
  }
  return items;
}

function toLanguage(entry: Record<string, unknown>): Language | undefined {
  if (typeof entry.id !== "string") {
    return undefined;
  }
  return {
    id: entry.id,
    name: optionalString(entry.name) ?? entry.id,
    extensions: Array.isArray(entry.extensions) ? entry.extensions.map(String) : [],
    monaco: optionalString(entry.monaco),
  };
}

function toCompiler(entry: Record<string, unknown>): Compiler | undefined {
  if (typeof entry.id !== "string") {
    return undefined;
  }
  return {
    id: entry.id,
    name: optionalString(entry.name) ?? entry.id,
    lang: optionalString(entry.lang) ?? "",
    compilerType: optionalString(entry.compilerType),
    semver: optionalString(entry.semver),
    instructionSet: optionalString(entry.instructionSet),
  };
}

// The formatter's type is what a format request names.
function toFormatter(entry: Record<string, unknown>): Formatter | undefined {
  if (typeof entry.type !== "string") {
    return undefined;
  }
  return {
    exe: optionalString(entry.exe) ?? "",
    name: optionalString(entry.name) ?? entry.type,
    styles: Array.isArray(entry.styles)
      ? entry.styles.filter((style): style is string => typeof style === "string")
      : [],
    type: entry.type,
    version: optionalString(entry.version) ?? "",
  };
}
