import type { Importer } from "./importer.js";
import type { ContainerResource, TokensAndUrlAuthData } from "./types.js";

/**
 * Import a whole tree, one importItem() call per container, depth first.
 * A container is always imported before its sub-folders so their parent
 * mapping exists when they are reached. Returns the number of containers
 * imported; the first failure propagates.
 */
export async function importTree(
  importer: Importer<TokensAndUrlAuthData, ContainerResource>,
  jobId: string,
  authData: TokensAndUrlAuthData,
  root: ContainerResource,
): Promise<number> {
  let imported = 0;
  const stack: ContainerResource[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    await importer.importItem(jobId, authData, node);
    imported++;
    // Reversed so siblings are visited in input order
    for (let i = node.folders.length - 1; i >= 0; i--) {
      stack.push(node.folders[i]);
    }
  }
  return imported;
}
