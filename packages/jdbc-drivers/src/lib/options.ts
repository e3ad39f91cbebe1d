import { invalidOption } from "./errors/catalog.js";

/**
 * Check a string option against its allowed values.
 * Undefined passes through so config defaults still apply.
 */
export function parseChoice<T extends string>(
  optionName: string,
  value: string | undefined,
  choices: readonly T[]
): T | undefined {
  if (value === undefined) return undefined;
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw invalidOption(optionName, `'${value}' is not supported`, choices);
  }
  return match;
}
