import { InvalidArgumentError } from "commander";
import { parsePositiveInt, parseSeed } from "./config.js";

// Commander only reports InvalidArgumentError as a usage error; anything else escapes parse.
function asArgumentParser<T>(parse: (value: string) => T): (value: string) => T {
  return (value: string) => {
    try {
      return parse(value);
    } catch (err) {
      throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
    }
  };
}

export const positiveIntArg = (label: string): ((value: string) => number) =>
  asArgumentParser(value => parsePositiveInt(value, label));

export const seedArg = (label: string): ((value: string) => number) =>
  asArgumentParser(value => parseSeed(value, label));
