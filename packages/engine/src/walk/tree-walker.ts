/**
 * Tree walker: mirrors a remote folder hierarchy onto a local directory.
 */

import * as path from 'node:path';
import type { Logger } from 'pino';
import type { RemoteDrive, RemoteFolder, RemoteNode } from '../remote/types.js';
import type { ItemFetcher } from '../transfer/item-fetcher.js';
import type { FetchResult } from '../transfer/types.js';

interface PendingFolder {
  children: AsyncIterator<RemoteNode>;
  destinationPath: string;
}

/**
 * Depth-first, pre-order walk over a drive subtree.
 *
 * Folders are created before their children are visited; children are
 * visited in the order the remote reports them. Descent uses an explicit
 * stack of child iterators, so nesting depth is bounded by memory only.
 */
export class TreeWalker {
  private readonly drive: RemoteDrive;
  private readonly fetcher: ItemFetcher;
  private readonly logger: Logger;

  constructor(drive: RemoteDrive, fetcher: ItemFetcher, logger: Logger) {
    this.drive = drive;
    this.fetcher = fetcher;
    this.logger = logger.child({ component: 'tree-walker' });
  }

  /** Mirror `node` (a folder or a single file) to `destinationPath`. */
  async walk(node: RemoteNode, destinationPath: string): Promise<FetchResult[]> {
    if (node.kind === 'file') {
      return [await this.fetcher.fetchFile(this.drive, node, destinationPath)];
    }

    const results: FetchResult[] = [];
    const stack: PendingFolder[] = [];
    await this.enterFolder(node, destinationPath, stack, results);

    while (stack.length > 0) {
      const current = stack[stack.length - 1];
      if (!current) {
        break;
      }

      const next = await current.children.next();
      if (next.done) {
        stack.pop();
        continue;
      }

      const child = next.value;
      const childPath = path.join(current.destinationPath, child.name);

      if (child.kind === 'folder') {
        await this.enterFolder(child, childPath, stack, results);
      } else {
        results.push(await this.fetcher.fetchFile(this.drive, child, childPath));
      }
    }

    return results;
  }

  /** Create the local folder and queue its children; a failed folder is recorded and not descended. */
  private async enterFolder(
    folder: RemoteFolder,
    destinationPath: string,
    stack: PendingFolder[],
    results: FetchResult[]
  ): Promise<void> {
    const failure = await this.fetcher.prepareFolder(destinationPath);
    if (failure) {
      results.push(failure);
      this.logger.warn({ remotePath: folder.path, destinationPath }, 'Skipping folder subtree');
      return;
    }

    this.logger.debug({ remotePath: folder.path, destinationPath }, 'Entering folder');
    stack.push({
      children: this.drive.iterate(folder)[Symbol.asyncIterator](),
      destinationPath,
    });
  }
}
