export const TAXA: Array<[number, string]> = [
  [1, "Homo_sapiens"],
  [2, "Pan_troglodytes"],
  [3, "Gorilla_gorilla"],
  [4, "Pongo_abelii"],
  [5, "Macaca_mulatta"],
];

type NexusOptions = {
  taxa?: Array<[number, string]>;
  marker?: string;
  label?: string;
};

/** Builds a MrBayes-style tree file around the given Newick payloads. */
export const buildNexus = (trees: string[], options: NexusOptions = {}): string => {
  const taxa = options.taxa ?? TAXA;
  const marker = options.marker ?? "[&U] ";
  const label = options.label ?? "gen";
  const translate = taxa.map(([id, name], index) => `\t\t${id} ${name}${index === taxa.length - 1 ? ";" : ","}`);
  return [
    "#NEXUS",
    "[ID: 0123456789]",
    "begin trees;",
    "\ttranslate",
    ...translate,
    ...trees.map((tree, index) => `\ttree ${label}.${index * 100} = ${marker}${tree};`),
    "end;",
    "",
  ].join("\n");
};

export const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the call to throw");
};
