import * as vscode from "vscode";

/**
 * Displays an error notification to the user in VS Code.
 *
 * Logs the error to the console and shows a non-modal error message in the editor.
 *
 * @param message - The error message to display.
 */
export async function errorNotification(message: string) {
  console.error(message);
  void vscode.window.showErrorMessage(message, { modal: false });
}

/**
 * Shows a short informational message, e.g. when a compilation finished.
 */
export async function infoNotification(message: string) {
  console.log(message);
  void vscode.window.showInformationMessage(message, { modal: false });
}

/**
 * Shows an informational message with a button that opens `url` in the browser.
 *
 * @param message - The message to display.
 * @param url - Target of the button; no button is shown when it is empty.
 * @param action - Label of the button.
 */
export async function notifyWithLink(message: string, url: string, action = "Open Reference") {
  if (!url) {
    void vscode.window.showInformationMessage(message, { modal: false });
    return;
  }

  const choice = await vscode.window.showInformationMessage(message, { modal: false }, action);
  if (choice === action) {
    await vscode.env.openExternal(vscode.Uri.parse(url));
  }
}
