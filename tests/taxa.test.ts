import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/errors";
import { checkTaxaEquivalence, translateSpecies, validateSpeciesRequest } from "../src/nexus/taxa";
import { captureError } from "./helpers";

const table = new Map<number, string>([
  [1, "Homo_sapiens"],
  [2, "Pan_troglodytes"],
  [3, "Gorilla_gorilla"],
]);

describe("checkTaxaEquivalence", () => {
  it("accepts identical pairs listed in a different order", () => {
    const reordered = new Map<number, string>([
      [3, "Gorilla_gorilla"],
      [1, "Homo_sapiens"],
      [2, "Pan_troglodytes"],
    ]);

    expect(() => checkTaxaEquivalence([table, reordered])).not.toThrow();
    expect(() => checkTaxaEquivalence([table])).not.toThrow();
  });

  it("names the second file when its taxon count differs", () => {
    const smaller = new Map<number, string>([
      [1, "Homo_sapiens"],
      [2, "Pan_troglodytes"],
    ]);

    const error = captureError(() => checkTaxaEquivalence([table, smaller]));

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ kind: "TaxaMismatch", fileIndex: 1 });
    expect(error instanceof Error ? error.message : "").toBe("Number of taxa in file 1 (3) and file 2 (2) is different");
  });

  it("names the file whose pairs differ", () => {
    const renamed = new Map<number, string>([
      [1, "Homo_sapiens"],
      [2, "Pan_paniscus"],
      [3, "Gorilla_gorilla"],
    ]);

    const error = captureError(() => checkTaxaEquivalence([table, table, renamed]));

    expect(error).toMatchObject({ kind: "TaxaMismatch", fileIndex: 2 });
    expect(error instanceof Error ? error.message : "").toBe(
      "Taxon (2, Pan_troglodytes) in file 1 differs from (2, Pan_paniscus) in file 3"
    );
  });

  it("needs at least one table", () => {
    expect(captureError(() => checkTaxaEquivalence([]))).toMatchObject({ kind: "NoInputFiles" });
  });
});

describe("species requests", () => {
  it("requires two distinct species", () => {
    expect(captureError(() => validateSpeciesRequest(["Homo_sapiens"]))).toMatchObject({ kind: "TooFewSpecies" });
    expect(captureError(() => validateSpeciesRequest(["Homo_sapiens", "Pan_troglodytes", "Homo_sapiens"]))).toMatchObject({
      kind: "DuplicateSpecies",
      species: "Homo_sapiens",
    });
    expect(() => validateSpeciesRequest(["Homo_sapiens", "Pan_troglodytes"])).not.toThrow();
  });

  it("translates names to ids in the requested order", () => {
    expect(translateSpecies(table, ["Gorilla_gorilla", "Homo_sapiens"])).toEqual([3, 1]);
  });

  it("rejects unknown species by name", () => {
    expect(captureError(() => translateSpecies(table, ["Homo_sapiens", "Pongo_abelii"]))).toMatchObject({
      kind: "UnknownSpecies",
      species: "Pongo_abelii",
    });
  });

  it("rejects a request covering every taxon", () => {
    expect(
      captureError(() => translateSpecies(table, ["Homo_sapiens", "Pan_troglodytes", "Gorilla_gorilla"]))
    ).toMatchObject({ kind: "TooManySpecies" });
  });
});
