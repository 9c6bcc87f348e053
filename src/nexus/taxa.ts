import { ValidationError } from "../errors";
import type { TaxonTable } from "../types/monophyly";

const sortedEntries = (table: TaxonTable): Array<[number, string]> =>
  Array.from(table.entries()).sort(([a], [b]) => a - b);

const describeEntry = ([id, name]: [number, string]): string => `(${id}, ${name})`;

/**
 * Fails unless every table lists the same (id, name) pairs as the first one.
 * `fileIndex` on the error counts files after the first, starting at 1.
 */
export const checkTaxaEquivalence = (tables: TaxonTable[]): void => {
  if (!tables.length) {
    throw new ValidationError("NoInputFiles", "No taxon tables to compare");
  }
  if (tables.length === 1) return;

  const template = sortedEntries(tables[0]);
  tables.slice(1).forEach((table, offset) => {
    const fileIndex = offset + 1;
    const fileNumber = offset + 2;
    if (table.size !== template.length) {
      throw new ValidationError(
        "TaxaMismatch",
        `Number of taxa in file 1 (${template.length}) and file ${fileNumber} (${table.size}) is different`,
        { fileIndex }
      );
    }
    const matched = sortedEntries(table);
    template.forEach((entry, position) => {
      const other = matched[position];
      if (entry[0] !== other[0] || entry[1] !== other[1]) {
        throw new ValidationError(
          "TaxaMismatch",
          `Taxon ${describeEntry(entry)} in file 1 differs from ${describeEntry(other)} in file ${fileNumber}`,
          { fileIndex }
        );
      }
    });
  });
};

export const validateSpeciesRequest = (species: string[]): void => {
  if (species.length < 2) {
    throw new ValidationError("TooFewSpecies", "At least 2 species must be specified");
  }
  const seen = new Set<string>();
  species.forEach((name) => {
    if (seen.has(name)) {
      throw new ValidationError("DuplicateSpecies", `Species '${name}' is listed more than once`, { species: name });
    }
    seen.add(name);
  });
};

/** Maps species names to taxon ids, keeping the caller's order. */
export const translateSpecies = (table: TaxonTable, species: string[]): number[] => {
  const reversed = new Map<string, number>();
  table.forEach((name, id) => {
    reversed.set(name, id);
  });

  const ids = species.map((name) => {
    const id = reversed.get(name);
    if (id === undefined) {
      throw new ValidationError("UnknownSpecies", `Species '${name}' is not among the tree taxa`, { species: name });
    }
    return id;
  });

  if (ids.length >= table.size) {
    throw new ValidationError(
      "TooManySpecies",
      `All ${table.size} taxa were requested; the clade would be the whole tree`
    );
  }
  return ids;
};
