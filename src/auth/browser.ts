import { execFile } from 'node:child_process';

export type BrowserOpener = (url: string) => Promise<void>;

function launcher(url: string): [command: string, args: string[]] {
  switch (process.platform) {
    case 'darwin':
      return ['open', [url]];
    case 'win32':
      // `start` would need a shell, which mangles `&` in the query string
      return ['rundll32', ['url.dll,FileProtocolHandler', url]];
    default:
      return ['xdg-open', [url]];
  }
}

/** Open `url` in the user's default browser. */
export const openInBrowser: BrowserOpener = (url) =>
  new Promise((resolve, reject) => {
    const [command, args] = launcher(url);
    const child = execFile(command, args, (error) => (error ? reject(error) : resolve()));
    child.unref();
  });
