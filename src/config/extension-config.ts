import * as vscode from "vscode";

/**
 * Extension configuration
 * Built-in defaults merged key by key with the `compilerExplorer.*` settings.
 */

export interface PromptConfig {
  lang: string;
  compiler: string;
  compilerOpts: string;
  formatter: string;
  formatterStyle: string;
}

/** Label templates; `${field}` is replaced by the item's field. */
export interface FormatItemConfig {
  lang: string;
  compiler: string;
  formatter: string;
  formatterStyle: string;
}

export interface ExtensionConfig {
  url: string;
  requestTimeoutMs: number;
  prompt: PromptConfig;
  formatItem: FormatItemConfig;
  enableLiveCorrelation: boolean;
  /** Theme color id used as the background of correlated lines. */
  highlightStyle: string;
}

export const DEFAULT_CONFIG: ExtensionConfig = {
  url: "https://godbolt.org",
  requestTimeoutMs: 30000,
  prompt: {
    lang: "Select language> ",
    compiler: "Select compiler> ",
    compilerOpts: "Select compiler options> ",
    formatter: "Select formatter> ",
    formatterStyle: "Select formatter style> ",
  },
  formatItem: {
    lang: "${name}",
    compiler: "${name}",
    formatter: "${name}",
    formatterStyle: "${value}",
  },
  enableLiveCorrelation: true,
  highlightStyle: "editor.rangeHighlightBackground",
};

/**
 * Reads the current configuration. Called at the start of every command so
 * settings changes apply to the next run without a reload.
 */
export function getExtensionConfig(): ExtensionConfig {
  const settings = vscode.workspace.getConfiguration("compilerExplorer");

  const read = <T extends string | number | boolean>(key: string, fallback: T): T => {
    const value = settings.get<T>(key);
    return typeof value === typeof fallback && value !== undefined ? value : fallback;
  };

  const prompt = DEFAULT_CONFIG.prompt;
  const formatItem = DEFAULT_CONFIG.formatItem;

  return {
    url: read("url", DEFAULT_CONFIG.url),
    requestTimeoutMs: read("requestTimeoutMs", DEFAULT_CONFIG.requestTimeoutMs),
    prompt: {
      lang: read("prompt.lang", prompt.lang),
      compiler: read("prompt.compiler", prompt.compiler),
      compilerOpts: read("prompt.compilerOpts", prompt.compilerOpts),
      formatter: read("prompt.formatter", prompt.formatter),
      formatterStyle: read("prompt.formatterStyle", prompt.formatterStyle),
    },
    formatItem: {
      lang: read("formatItem.lang", formatItem.lang),
      compiler: read("formatItem.compiler", formatItem.compiler),
      formatter: read("formatItem.formatter", formatItem.formatter),
      formatterStyle: read("formatItem.formatterStyle", formatItem.formatterStyle),
    },
    enableLiveCorrelation: read("liveCorrelation.enable", DEFAULT_CONFIG.enableLiveCorrelation),
    highlightStyle: read("liveCorrelation.highlightStyle", DEFAULT_CONFIG.highlightStyle),
  };
}
