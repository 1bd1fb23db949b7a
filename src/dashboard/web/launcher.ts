/**
 * Editor Launcher
 *
 * A page opened from disk cannot start an application itself; the relay
 * does it on the page's behalf, either through the editor's CLI or by
 * handing its URL scheme to the platform opener.
 */

import { DevshelfError } from '../../errors.js';
import { spawnDetached } from '../../tools/terminal.js';

export interface LaunchOptions {
  newWindow: boolean;
}

export interface EditorLauncher {
  open(projectPath: string, options: LaunchOptions): Promise<void>;
}

export interface EditorSettings {
  urlTemplate: string;
  command: string | null;
}

export function editorUrl(urlTemplate: string, projectPath: string): string {
  return urlTemplate.replace('{path}', encodeURI(projectPath));
}

/**
 * Command and arguments that hand a URL to the desktop
 */
export function platformOpener(url: string, platform: NodeJS.Platform = process.platform): [string, string[]] {
  if (platform === 'darwin') return ['open', [url]];
  if (platform === 'win32') return ['cmd', ['/c', 'start', '""', url]];
  return ['xdg-open', [url]];
}

/**
 * Open URL in default browser
 */
export async function openBrowser(url: string): Promise<void> {
  const [command, args] = platformOpener(url);
  await spawnDetached(command, args);
}

// URL schemes whose editors ship a CLI that takes -n for a new window
const EDITOR_COMMANDS: Record<string, string> = {
  cursor: 'cursor',
  vscode: 'code',
  'vscode-insiders': 'code-insiders',
  windsurf: 'windsurf',
};

/**
 * Editor CLI implied by a URL template, or null for unknown schemes
 */
export function editorCommandFor(urlTemplate: string): string | null {
  const scheme = /^([a-z][a-z0-9+.-]*):/i.exec(urlTemplate)?.[1]?.toLowerCase();
  return scheme ? EDITOR_COMMANDS[scheme] ?? null : null;
}

export type Spawner = (command: string, args: readonly string[]) => Promise<void>;

export function createEditorLauncher(editor: EditorSettings, spawn: Spawner = spawnDetached): EditorLauncher {
  return {
    async open(projectPath, options) {
      // URL schemes cannot ask for a new window, so that goes through the CLI
      const command = editor.command ?? (options.newWindow ? editorCommandFor(editor.urlTemplate) : null);
      if (options.newWindow && !command) {
        throw new DevshelfError(
          'NEW_WINDOW_UNSUPPORTED',
          `Cannot open a new window through ${editor.urlTemplate}; set editor.command`,
        );
      }

      if (command) {
        const args = options.newWindow ? ['-n', projectPath] : [projectPath];
        await spawn(command, args);
        return;
      }

      const [opener, args] = platformOpener(editorUrl(editor.urlTemplate, projectPath));
      await spawn(opener, args);
    },
  };
}
