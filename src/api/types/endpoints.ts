import { getExtensionConfig } from "../../config/extension-config";

const DEFAULT_URL = "https://godbolt.org";

/**
 * Resolves the base URL of the Compiler Explorer instance.
 *
 * The `compilerExplorer.url` setting wins when the user changed it;
 * otherwise `COMPILER_EXPLORER_URL` from the environment (or a .env file),
 * then the public instance.
 */
export function getBaseUrl(): string {
  const configured = getExtensionConfig().url;
  if (configured && configured !== DEFAULT_URL) {
    return stripTrailingSlash(configured);
  }
  return stripTrailingSlash(process.env.COMPILER_EXPLORER_URL || DEFAULT_URL);
}

const stripTrailingSlash = (url: string): string => url.replace(/\/+$/, "");

export const LANGUAGES_ENDPOINT = () =>
  `${getBaseUrl()}/api/languages?fields=id,name,extensions,monaco`;

export const COMPILERS_ENDPOINT = (languageId: string) =>
  `${getBaseUrl()}/api/compilers/${encodeURIComponent(languageId)}` +
  "?fields=id,name,lang,compilerType,semver,instructionSet";

export const COMPILE_ENDPOINT = (compilerId: string) =>
  `${getBaseUrl()}/api/compiler/${encodeURIComponent(compilerId)}/compile`;

export const FORMATTERS_ENDPOINT = () => `${getBaseUrl()}/api/formats`;

export const FORMAT_ENDPOINT = (formatterType: string) =>
  `${getBaseUrl()}/api/format/${encodeURIComponent(formatterType)}`;

export const INSTRUCTION_DOC_ENDPOINT = (instructionSet: string, opcode: string) =>
  `${getBaseUrl()}/api/asm/${encodeURIComponent(instructionSet)}/${encodeURIComponent(opcode)}`;
