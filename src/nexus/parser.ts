import { ParsingError } from "../errors";
import type { ParsedTreeFile, TopologyString } from "../types/monophyly";

const NUMBER = "(?:[0-9]+\\.?[0-9]*|\\.[0-9]+)(?:[eE][-+]?[0-9]+)?";
const RATE_ANNOTATION = new RegExp(`\\[&rate=${NUMBER}\\]`, "g");
const BRANCH_LENGTH = new RegExp(`:${NUMBER}`, "g");
const TOPOLOGY_MARKERS = ["[&U] ", "[&R] "];
const TREE_SEPARATOR = " = ";

const normalizeLine = (line: string): string => line.trim().toLowerCase();

const trimTranslateEntry = (line: string): string => line.trim().replace(/[,;\s]+$/, "");

const trimTreeLine = (line: string): string => line.replace(/^[\s;]+|[\s;]+$/g, "");

const splitLines = (text: string): string[] => text.split(/\r?\n/);

const parseTaxonId = (token: string, lineNumber: number): number => {
  if (!/^\d+$/.test(token) || Number(token) <= 0) {
    throw new ParsingError("MalformedTranslate", `Translate id '${token}' is not a positive integer`, lineNumber);
  }
  return Number(token);
};

/** Strips the rootedness marker and every rate or branch-length annotation from a tree payload. */
export const stripTopologyAnnotations = (payload: string): TopologyString => {
  let topology = trimTreeLine(payload);
  const marker = TOPOLOGY_MARKERS.find((candidate) => topology.startsWith(candidate));
  if (marker) {
    topology = topology.slice(marker.length);
  }
  if (topology.includes("[")) {
    topology = topology.replace(RATE_ANNOTATION, "");
  }
  return topology.replace(BRANCH_LENGTH, "");
};

const findLine = (lines: string[], start: number, predicate: (line: string) => boolean): number => {
  for (let index = start; index < lines.length; index += 1) {
    if (predicate(lines[index])) return index;
  }
  return -1;
};

/**
 * Reads the translate table and tree topologies out of the `begin trees;`
 * block of a MrBayes or BEAST NEXUS file. Other blocks are skipped.
 */
export const parseNexusTrees = (text: string): ParsedTreeFile => {
  const lines = splitLines(text);

  const header = findLine(lines, 0, (line) => line.trim().length > 0);
  if (header < 0 || normalizeLine(lines[header]) !== "#nexus") {
    throw new ParsingError("NotNexus", "Input is not a NEXUS file: first line must be #NEXUS");
  }

  const blockStart = findLine(lines, header + 1, (line) => normalizeLine(line) === "begin trees;");
  if (blockStart < 0) {
    throw new ParsingError("NoTreesBlock", "Begin trees block not found");
  }

  const translateLine = blockStart + 1;
  if (translateLine >= lines.length || normalizeLine(lines[translateLine]) !== "translate") {
    throw new ParsingError(
      "MalformedTranslate",
      "Malformed trees block: 'translate' must follow 'begin trees;'",
      translateLine + 1
    );
  }

  const taxa = new Map<number, string>();
  let translateEnd = -1;
  for (let index = translateLine + 1; index < lines.length; index += 1) {
    const pair = trimTranslateEntry(lines[index]).split(/\s+/).filter(Boolean);
    if (pair.length !== 2) {
      translateEnd = index;
      break;
    }
    // later duplicates win
    taxa.set(parseTaxonId(pair[0], index + 1), pair[1]);
  }
  if (translateEnd < 0) {
    throw new ParsingError("NoTranslateEnd", "End of translate block not found");
  }

  const treesStart = findLine(lines, translateEnd, (line) => line.trim().slice(0, 4).toLowerCase() === "tree");
  if (treesStart < 0) {
    throw new ParsingError("NoTrees", "No tree definition found after the translate block");
  }

  const topologies: TopologyString[] = [];
  for (let index = treesStart; index < lines.length; index += 1) {
    const line = trimTreeLine(lines[index]);
    if (!line) continue;
    if (line.toLowerCase() === "end") break;

    const separator = line.indexOf(TREE_SEPARATOR);
    if (separator < 0) {
      throw new ParsingError("MalformedTree", `Tree definition is missing '${TREE_SEPARATOR.trim()}'`, index + 1);
    }
    topologies.push(stripTopologyAnnotations(line.slice(separator + TREE_SEPARATOR.length)));
  }

  return { taxa, topologies };
};
