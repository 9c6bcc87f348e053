export type TaxonTable = ReadonlyMap<number, string>;

export type TopologyString = string;

export type ParsedTreeFile = {
  taxa: TaxonTable;
  topologies: TopologyString[];
};

export type LeafNode = { readonly kind: "leaf"; readonly taxonId: number };
export type InternalNode = { readonly kind: "internal"; readonly children: readonly TreeNode[] };
export type TreeNode = LeafNode | InternalNode;

export type TreeFileInput = { name: string; text: string };

export type MonophylyTestOptions = {
  species: string[];
  burnin?: number;
  rooted?: boolean;
};

export type MonophylyStatistics = {
  totalTrees: number;
  retainedTrees: number;
  monophyleticCount: number;
  expectedMonophyleticCount: number;
  prior: number;
  posterior: number;
  bayesFactor: number;
  chanceProbability: number | null;
};

export type RunSummary = { name: string; treesRead: number; treesRetained: number };

export type MonophylyReport = MonophylyStatistics & {
  species: string[];
  speciesIds: number[];
  taxonCount: number;
  burnin: number;
  rooted: boolean;
  runs: RunSummary[];
};
