export type ParsingErrorKind =
  | "NotNexus"
  | "NoTreesBlock"
  | "MalformedTranslate"
  | "NoTranslateEnd"
  | "NoTrees"
  | "MalformedTree"
  | "MalformedNewick";

export type ValidationErrorKind =
  | "NoInputFiles"
  | "TooFewSpecies"
  | "TooManySpecies"
  | "DuplicateSpecies"
  | "TaxaMismatch"
  | "UnknownSpecies"
  | "SpeciesNotInTree"
  | "InvalidBurnin"
  | "DegeneratePrior"
  | "DegeneratePosterior";

/** Malformed input file or topology string. `line` is 1-based when known. */
export class ParsingError extends Error {
  readonly kind: ParsingErrorKind;
  readonly line?: number;

  constructor(kind: ParsingErrorKind, message: string, line?: number) {
    super(line === undefined ? message : `${message} (line ${line})`);
    this.name = "ParsingError";
    this.kind = kind;
    this.line = line;
  }
}

export class ValidationError extends Error {
  readonly kind: ValidationErrorKind;
  readonly fileIndex?: number;
  readonly species?: string;

  constructor(kind: ValidationErrorKind, message: string, details: { fileIndex?: number; species?: string } = {}) {
    super(message);
    this.name = "ValidationError";
    this.kind = kind;
    this.fileIndex = details.fileIndex;
    this.species = details.species;
  }
}
