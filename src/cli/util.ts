import { createInterface } from "readline";
import { InvalidArgumentError } from "commander";

export function prompt(question: string): Promise<string> {
  return new Promise((resolve) => {
    const rl = createInterface({ input: process.stdin, output: process.stderr });
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

export async function confirm(question: string, defaultYes: boolean): Promise<boolean> {
  const answer = (await prompt(`${question} ${defaultYes ? "[Y/n]" : "[y/N]"}: `)).toLowerCase();
  if (!answer) return defaultYes;
  return answer === "y" || answer === "yes";
}

/**
 * Parse "101, 102,103" into ticket ids. Blank entries are dropped.
 */
export function parseTicketIds(value: string): number[] {
  const ids: number[] = [];
  for (const part of value.split(",")) {
    const trimmed = part.trim();
    if (!trimmed) continue;
    if (!/^\d+$/.test(trimmed)) {
      throw new InvalidArgumentError(`Invalid ticket ID: "${trimmed}"`);
    }
    ids.push(Number(trimmed));
  }
  if (ids.length === 0) {
    throw new InvalidArgumentError("No ticket IDs given.");
  }
  return ids;
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return n;
}

export function timestamp(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
