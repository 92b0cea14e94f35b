/**
 * Balanced line tree: a B-tree whose leaves hold runs of line strings.
 *
 * Every node stores lineCount and charCount for its subtree, enabling
 * O(log n) line-to-offset and offset-to-line lookup and O(log n) line
 * splicing. A line weighs its length plus one for its line break, so the
 * document length is root.charCount - 1 (the last line has no break).
 */

const MAX_LEAF_LINES = 64;
const MAX_CHILDREN = 32;

interface LeafNode {
  kind: 'leaf';
  lines: string[];
  lineCount: number;
  charCount: number;
}

interface InternalNode {
  kind: 'internal';
  children: TreeNode[];
  lineCount: number;
  charCount: number;
}

type TreeNode = LeafNode | InternalNode;

interface PathEntry {
  node: InternalNode;
  childIndex: number;
}

/** Result of locating a line within the tree. */
interface LineLocation {
  leaf: LeafNode;
  /** Index within leaf.lines; equals leaf.lines.length for the end position. */
  index: number;
  /** Path from root to leaf (for tree modifications). */
  path: PathEntry[];
}

function createLeaf(lines: string[]): LeafNode {
  const leaf: LeafNode = { kind: 'leaf', lines, lineCount: 0, charCount: 0 };
  refreshLeaf(leaf);
  return leaf;
}

function createInternal(children: TreeNode[]): InternalNode {
  const node: InternalNode = { kind: 'internal', children, lineCount: 0, charCount: 0 };
  refreshInternal(node);
  return node;
}

function refreshLeaf(leaf: LeafNode): void {
  let cc = 0;
  for (const line of leaf.lines) cc += line.length + 1;
  leaf.lineCount = leaf.lines.length;
  leaf.charCount = cc;
}

function refreshInternal(node: InternalNode): void {
  let lc = 0, cc = 0;
  for (const c of node.children) {
    lc += c.lineCount;
    cc += c.charCount;
  }
  node.lineCount = lc;
  node.charCount = cc;
}

function chunk<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

function buildFromNodes(nodes: TreeNode[]): TreeNode {
  if (nodes.length === 1) return nodes[0];
  if (nodes.length <= MAX_CHILDREN) return createInternal(nodes);
  return buildFromNodes(chunk(nodes, MAX_CHILDREN).map(createInternal));
}

function buildTree(lines: string[]): TreeNode {
  if (lines.length <= MAX_LEAF_LINES) return createLeaf(lines);
  return buildFromNodes(chunk(lines, MAX_LEAF_LINES / 2).map(createLeaf));
}

export class LineTree {
  private root: TreeNode;

  constructor(lines: string[]) {
    this.root = buildTree([...lines]);
  }

  get lineCount(): number {
    return this.root.lineCount;
  }

  /** Document length in characters. */
  get length(): number {
    return Math.max(0, this.root.charCount - 1);
  }

  getLine(lineNumber: number): string {
    const { leaf, index } = this.locate(lineNumber);
    return leaf.lines[index] ?? '';
  }

  /** Character offset of the start of a line. */
  offsetOfLine(lineNumber: number): number {
    let node = this.root;
    let remaining = lineNumber;
    let offset = 0;

    while (node.kind === 'internal') {
      let next: TreeNode | null = null;
      for (const child of node.children) {
        if (remaining < child.lineCount) {
          next = child;
          break;
        }
        remaining -= child.lineCount;
        offset += child.charCount;
      }
      if (!next) return offset;
      node = next;
    }

    for (let i = 0; i < remaining && i < node.lines.length; i++) {
      offset += node.lines[i].length + 1;
    }
    return offset;
  }

  /** Find the (line, column) containing a character offset in [0, length]. */
  lineAtOffset(offset: number): { line: number; column: number } {
    let node = this.root;
    let remaining = offset;
    let line = 0;

    while (node.kind === 'internal') {
      let next: TreeNode | null = null;
      for (const child of node.children) {
        if (remaining < child.charCount) {
          next = child;
          break;
        }
        remaining -= child.charCount;
        line += child.lineCount;
      }
      if (!next) {
        // Past the end: clamp to the end of the last line
        const last = this.lineCount - 1;
        return { line: last, column: this.getLine(last).length };
      }
      node = next;
    }

    for (let i = 0; i < node.lines.length; i++) {
      const weight = node.lines[i].length + 1;
      if (remaining < weight) return { line: line + i, column: remaining };
      remaining -= weight;
    }
    const last = Math.max(0, this.lineCount - 1);
    return { line: last, column: this.getLine(last).length };
  }

  /**
   * Replace `deleteCount` lines starting at `start` with `insert`.
   */
  splice(start: number, deleteCount: number, insert: readonly string[]): void {
    if (start < 0 || deleteCount < 0 || start + deleteCount > this.lineCount) {
      throw new RangeError(
        `Invalid line splice ${start}+${deleteCount} on ${this.lineCount} lines`,
      );
    }
    this.deleteLines(start, deleteCount);
    this.insertLines(start, insert);
  }

  /**
   * Walk lines in [from, to), calling the callback for each.
   */
  walkLines(from: number, to: number, callback: (line: string, lineNumber: number) => void): void {
    this.walkNode(this.root, 0, from, to, callback);
  }

  /** All lines, in order. */
  toArray(): string[] {
    const out: string[] = [];
    this.walkLines(0, this.lineCount, (line) => out.push(line));
    return out;
  }

  /** Tree height, for tests and diagnostics. */
  get depth(): number {
    let depth = 1;
    let node = this.root;
    while (node.kind === 'internal') {
      node = node.children[0];
      depth++;
    }
    return depth;
  }

  private walkNode(
    node: TreeNode,
    base: number,
    from: number,
    to: number,
    callback: (line: string, lineNumber: number) => void,
  ): void {
    if (base >= to || base + node.lineCount <= from) return;
    if (node.kind === 'leaf') {
      const end = Math.min(node.lines.length, to - base);
      for (let i = Math.max(0, from - base); i < end; i++) {
        callback(node.lines[i], base + i);
      }
      return;
    }
    let childBase = base;
    for (const child of node.children) {
      this.walkNode(child, childBase, from, to, callback);
      childBase += child.lineCount;
      if (childBase >= to) break;
    }
  }

  /** Locate a line; lineNumber === lineCount yields the end position. */
  private locate(lineNumber: number): LineLocation {
    const path: PathEntry[] = [];
    let node = this.root;
    let remaining = Math.max(0, lineNumber);

    while (node.kind === 'internal') {
      let childIndex = -1;
      for (let i = 0; i < node.children.length; i++) {
        const child = node.children[i];
        if (remaining < child.lineCount) {
          childIndex = i;
          break;
        }
        remaining -= child.lineCount;
      }
      if (childIndex === -1) {
        // End of document: descend along the last child
        childIndex = node.children.length - 1;
        remaining = node.children[childIndex].lineCount;
      }
      path.push({ node, childIndex });
      node = node.children[childIndex];
    }

    return { leaf: node, index: Math.min(remaining, node.lines.length), path };
  }

  private deleteLines(start: number, count: number): void {
    let remaining = count;
    while (remaining > 0) {
      const { leaf, index, path } = this.locate(start);
      const n = Math.min(remaining, leaf.lines.length - index);
      leaf.lines.splice(index, n);
      remaining -= n;
      refreshLeaf(leaf);

      if (leaf.lines.length === 0 && path.length > 0) {
        this.removeEmptyLeaf(path);
      } else {
        for (let d = path.length - 1; d >= 0; d--) refreshInternal(path[d].node);
      }
    }
  }

  private removeEmptyLeaf(path: PathEntry[]): void {
    let depth = path.length - 1;
    while (depth >= 0) {
      const { node, childIndex } = path[depth];
      node.children.splice(childIndex, 1);
      if (node.children.length > 0 || depth === 0) break;
      depth--;
    }
    for (let d = depth; d >= 0; d--) refreshInternal(path[d].node);
    this.collapseRoot();
  }

  private collapseRoot(): void {
    while (this.root.kind === 'internal' && this.root.children.length === 1) {
      this.root = this.root.children[0];
    }
    if (this.root.kind === 'internal' && this.root.children.length === 0) {
      this.root = createLeaf([]);
    }
  }

  private insertLines(at: number, lines: readonly string[]): void {
    if (lines.length === 0) return;
    const { leaf, index, path } = this.locate(at);
    leaf.lines = [...leaf.lines.slice(0, index), ...lines, ...leaf.lines.slice(index)];
    refreshLeaf(leaf);

    let replacement: TreeNode[] | null = leaf.lines.length > MAX_LEAF_LINES
      ? chunk(leaf.lines, MAX_LEAF_LINES / 2).map(createLeaf)
      : null;

    for (let depth = path.length - 1; depth >= 0; depth--) {
      const { node, childIndex } = path[depth];
      if (replacement) {
        node.children = [
          ...node.children.slice(0, childIndex),
          ...replacement,
          ...node.children.slice(childIndex + 1),
        ];
        replacement = node.children.length > MAX_CHILDREN
          ? chunk(node.children, MAX_CHILDREN / 2).map(createInternal)
          : null;
      }
      if (!replacement) refreshInternal(node);
    }

    if (replacement) this.root = buildFromNodes(replacement);
  }
}
