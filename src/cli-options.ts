import { InvalidArgumentError } from "commander";

function parseInteger(value: string): number | undefined {
  const n = Number(value);
  return value.trim() !== "" && Number.isInteger(n) ? n : undefined;
}

export function nonNegativeInt(value: string): number {
  const n = parseInteger(value);
  if (n === undefined || n < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return n;
}

export function positiveInt(value: string): number {
  const n = parseInteger(value);
  if (n === undefined || n < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}
