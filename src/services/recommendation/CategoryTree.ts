import { CatalogEntry } from '../../types/models';

export type CategoryNodeKind = 'root' | 'category' | 'item';

export interface CategoryNode {
  label: string;
  kind: CategoryNodeKind;
  children: CategoryNode[];
}

export const DEFAULT_ROOT_LABEL = 'All Games';

/**
 * Genre taxonomy: top-level children of the root are genres, item nodes are games.
 *
 * Node kinds are stored rather than inferred from child count, so a game sharing its name
 * with a genre never merges into the genre node. The item -> genres index is computed on
 * first use and kept until `invalidate()` or `rebuild()`; `insertPath` leaves it alone.
 */
export class CategoryTree {
  private readonly root: CategoryNode;
  private index: Map<string, Set<string>> | null = null;

  constructor(rootLabel: string = DEFAULT_ROOT_LABEL) {
    this.root = { label: rootLabel, kind: 'root', children: [] };
  }

  get rootLabel(): string {
    return this.root.label;
  }

  isEmpty(): boolean {
    return this.root.children.length === 0;
  }

  /**
   * Insert a chain of category labels ending in a game name.
   * Existing nodes with the same label and kind are reused.
   * Paths without at least one category above the game are ignored.
   */
  insertPath(labels: readonly string[]): void {
    if (labels.length < 2) return;
    let node = this.root;
    labels.forEach((label, depth) => {
      const kind: CategoryNodeKind = depth === labels.length - 1 ? 'item' : 'category';
      let child = node.children.find(c => c.label === label && c.kind === kind);
      if (!child) {
        child = { label, kind, children: [] };
        node.children.push(child);
      }
      node = child;
    });
  }

  /**
   * Top-level genres whose subtree holds the given game
   */
  categoriesOf(item: string): Set<string> {
    const categories = new Set<string>();
    for (const subtree of this.root.children) {
      if (subtree.kind === 'category' && containsItem(subtree, item)) {
        categories.add(subtree.label);
      }
    }
    return categories;
  }

  /**
   * Distinct game names, in order of first appearance
   */
  allItemNames(): string[] {
    const names = new Set<string>();
    const visit = (node: CategoryNode): void => {
      if (node.kind === 'item') {
        names.add(node.label);
      }
      node.children.forEach(visit);
    };
    visit(this.root);
    return Array.from(names);
  }

  categoryIndex(): Map<string, Set<string>> {
    if (!this.index) {
      const index = new Map<string, Set<string>>();
      for (const item of this.allItemNames()) {
        index.set(item, this.categoriesOf(item));
      }
      this.index = index;
    }
    return this.index;
  }

  invalidate(): void {
    this.index = null;
  }

  /**
   * Replace the whole taxonomy with a new catalog
   */
  rebuild(entries: Iterable<CatalogEntry>): void {
    this.root.children = [];
    insertCatalog(this, entries);
    this.invalidate();
  }

  contains(label: string): boolean {
    return containsLabel(this.root, label);
  }

  /**
   * Number of nodes, root included
   */
  size(): number {
    const count = (node: CategoryNode): number =>
      node.children.reduce((total, child) => total + count(child), 1);
    return count(this.root);
  }

  toString(): string {
    const lines: string[] = [];
    const render = (node: CategoryNode, depth: number): void => {
      lines.push(`${'  '.repeat(depth)}${node.label}`);
      node.children.forEach(child => render(child, depth + 1));
    };
    render(this.root, 0);
    return lines.join('\n');
  }
}

function containsItem(node: CategoryNode, item: string): boolean {
  if (node.kind === 'item' && node.label === item) return true;
  return node.children.some(child => containsItem(child, item));
}

function containsLabel(node: CategoryNode, label: string): boolean {
  if (node.label === label) return true;
  return node.children.some(child => containsLabel(child, label));
}

function insertCatalog(tree: CategoryTree, entries: Iterable<CatalogEntry>): void {
  for (const entry of entries) {
    for (const category of entry.categories) {
      tree.insertPath([category, entry.itemName]);
    }
  }
}

/**
 * Build a taxonomy of [genre, game] paths from a classified catalog
 */
export function buildCategoryTree(entries: Iterable<CatalogEntry>, rootLabel: string = DEFAULT_ROOT_LABEL): CategoryTree {
  const tree = new CategoryTree(rootLabel);
  insertCatalog(tree, entries);
  return tree;
}
