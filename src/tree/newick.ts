import { ParsingError } from "../errors";
import type { InternalNode, LeafNode, TopologyString, TreeNode } from "../types/monophyly";

const isWhitespace = (char: string): boolean => /\s/.test(char);
const isDelimiter = (char: string): boolean => /[(),;\s]/.test(char);

const fail = (message: string, topology: string): never => {
  throw new ParsingError("MalformedNewick", `${message} in topology '${topology}'`);
};

/**
 * Parses a bare topology (integer leaves, no labels or lengths) into a tree.
 * The outermost clade becomes the root; rootedness is not inferred.
 */
export const parseTopology = (topology: TopologyString): TreeNode => {
  let position = 0;
  const seen = new Set<number>();

  const skipWhitespace = () => {
    while (position < topology.length && isWhitespace(topology[position])) position += 1;
  };

  const parseLeaf = (): LeafNode => {
    const start = position;
    while (position < topology.length && !isDelimiter(topology[position])) position += 1;
    const token = topology.slice(start, position);
    if (!token) {
      return fail(`Expected a taxon id at position ${start}`, topology);
    }
    if (!/^\d+$/.test(token)) {
      return fail(`Leaf '${token}' is not an integer taxon id`, topology);
    }
    const taxonId = Number(token);
    if (seen.has(taxonId)) {
      return fail(`Taxon ${taxonId} appears more than once`, topology);
    }
    seen.add(taxonId);
    return { kind: "leaf", taxonId };
  };

  const parseClade = (): TreeNode => {
    skipWhitespace();
    if (topology[position] !== "(") {
      return parseLeaf();
    }
    position += 1;
    const children: TreeNode[] = [];
    for (;;) {
      children.push(parseClade());
      skipWhitespace();
      const next = topology[position];
      if (next === ",") {
        position += 1;
        continue;
      }
      if (next === ")") {
        position += 1;
        break;
      }
      return fail(next === undefined ? "Unclosed '('" : `Unexpected '${next}' at position ${position}`, topology);
    }
    if (children.length < 2) {
      return fail("Clade with fewer than two children", topology);
    }
    const node: InternalNode = { kind: "internal", children };
    return node;
  };

  const root = parseClade();
  skipWhitespace();
  if (topology[position] === ";") position += 1;
  skipWhitespace();
  if (position < topology.length) {
    fail(`Unexpected '${topology[position]}' at position ${position}`, topology);
  }
  return root;
};

export const leafIds = (node: TreeNode): number[] => {
  if (node.kind === "leaf") return [node.taxonId];
  return node.children.flatMap((child) => leafIds(child));
};
