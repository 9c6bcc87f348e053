import { ValidationError } from "../errors";
import type { TreeNode } from "../types/monophyly";
import { leafIds } from "./newick";

type CladeCounts = { leaves: number; targets: number };

/**
 * True when the target taxa form a clade of `tree`.
 *
 * Leaf ids are unique within a parsed tree, so a node's leaf set equals the
 * target set exactly when it holds |S| leaves that are all targets, and equals
 * the complement when it holds `total - |S|` leaves and no target. The
 * complement only counts for unrooted trees, where the serialized root is an
 * artifact and either side of an edge can be the clade.
 */
export const isMonophyletic = (tree: TreeNode, targetIds: number[], rooted: boolean): boolean => {
  const targets = new Set(targetIds);
  if (targets.size < 2) {
    throw new ValidationError("TooFewSpecies", "Monophyly needs at least 2 distinct target taxa");
  }

  const present = new Set(leafIds(tree));
  const missing = Array.from(targets).filter((id) => !present.has(id));
  if (missing.length) {
    throw new ValidationError("SpeciesNotInTree", `Taxa ${missing.join(", ")} are not in the tree`);
  }
  if (targets.size >= present.size) {
    throw new ValidationError("TooManySpecies", "Target taxa cover the whole tree");
  }

  const complementSize = present.size - targets.size;
  let found = false;

  const visit = (node: TreeNode): CladeCounts => {
    let counts: CladeCounts;
    if (node.kind === "leaf") {
      counts = { leaves: 1, targets: targets.has(node.taxonId) ? 1 : 0 };
    } else {
      counts = { leaves: 0, targets: 0 };
      for (const child of node.children) {
        const childCounts = visit(child);
        if (found) return counts;
        counts.leaves += childCounts.leaves;
        counts.targets += childCounts.targets;
      }
    }

    if (counts.leaves === targets.size && counts.targets === targets.size) {
      found = true;
    } else if (!rooted && counts.leaves === complementSize && counts.targets === 0) {
      found = true;
    }
    return counts;
  };

  visit(tree);
  return found;
};
