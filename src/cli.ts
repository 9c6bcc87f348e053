import { parseArgs } from "node:util";
import { runMonophylyTestOnFiles } from "./analysis/monophylyTest";
import { config } from "./config";
import { ParsingError, ValidationError } from "./errors";
import { formatReport } from "./report/format";

export const USAGE = `Usage: monophyly -s <species> -s <species> [...] [-b <fraction>] [--rooted] <tree file> [...]

Bayesian monophyly test over MrBayes or BEAST tree samples. Use several files
only when they are runs of the same analysis.`;

const splitList = (values: string[] | undefined): string[] =>
  (values ?? []).flatMap((value) => value.split(",")).map((value) => value.trim()).filter(Boolean);

/** Runs the command line and resolves to the process exit code. */
export const runCli = async (args: string[]): Promise<number> => {
  try {
    const { values, positionals } = parseArgs({
      args,
      allowPositionals: true,
      options: {
        species: { type: "string", short: "s", multiple: true },
        input: { type: "string", short: "i", multiple: true },
        burnin: { type: "string", short: "b" },
        rooted: { type: "boolean" },
        help: { type: "boolean", short: "h" },
      },
    });

    if (values.help) {
      console.log(USAGE);
      return 0;
    }

    const inputs = [...(values.input ?? []), ...positionals];
    if (!inputs.length) {
      console.error(USAGE);
      return 1;
    }

    const report = await runMonophylyTestOnFiles(inputs, {
      species: splitList(values.species),
      burnin: values.burnin === undefined ? config.burnin : Number(values.burnin),
      rooted: values.rooted ?? config.rooted,
    });
    console.log(formatReport(report));
    return 0;
  } catch (error) {
    if (error instanceof ParsingError || error instanceof ValidationError) {
      console.error(`ERROR: ${error.message}`);
    } else {
      console.error(error);
    }
    return 1;
  }
};
