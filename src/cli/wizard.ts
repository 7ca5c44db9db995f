import { AVAILABLE_MODELS } from "../core/config.js";
import { DEFAULT_PAGES } from "../core/pipeline.js";
import { prompt, confirm, parseTicketIds, parsePositiveInt } from "./util.js";

export interface WizardAnswers {
  pages?: number;
  ticketIds?: number[];
  reprocess: boolean;
  refresh: boolean;
  model: string;
}

/**
 * Ask for the run parameters on the terminal. Returns null when the user
 * declines to proceed.
 */
export async function runWizard(defaults: { model: string; output: string }): Promise<WizardAnswers | null> {
  const source = await prompt(
    "How would you like to select tickets?\n  1) Latest resolved tickets (by pages)\n  2) Enter ticket IDs manually\nChoice [1]: "
  );

  let pages: number | undefined;
  let ticketIds: number[] | undefined;
  if (source === "2") {
    ticketIds = parseTicketIds(await prompt("Enter comma-separated ticket IDs: "));
  } else {
    const raw = await prompt(`Number of pages to fetch [${DEFAULT_PAGES}]: `);
    pages = raw ? parsePositiveInt(raw) : DEFAULT_PAGES;
  }

  const reprocess = await confirm("Reprocess tickets already in the DB?", false);
  const refresh = await confirm("Refresh conversations from the helpdesk?", false);

  process.stderr.write("\nModels:\n");
  AVAILABLE_MODELS.forEach((m, i) => {
    const marker = m.model === defaults.model ? " (default)" : "";
    process.stderr.write(`  ${i + 1}) ${m.model} [${m.provider}]${marker}\n`);
  });
  const modelChoice = await prompt("Model [default]: ");
  const picked = modelChoice ? AVAILABLE_MODELS[parsePositiveInt(modelChoice) - 1] : undefined;
  if (modelChoice && !picked) {
    throw new Error(`No model numbered ${modelChoice}.`);
  }
  const model = picked?.model ?? defaults.model;

  process.stderr.write("\nRun summary\n");
  process.stderr.write(`  ${ticketIds ? "Ticket IDs" : "Pages"}:  ${ticketIds ? ticketIds.join(", ") : pages}\n`);
  process.stderr.write(`  Reprocess:   ${reprocess}\n`);
  process.stderr.write(`  Refresh:     ${refresh}\n`);
  process.stderr.write(`  Model:       ${model}\n`);
  process.stderr.write(`  Output:      ${defaults.output}\n\n`);

  if (!(await confirm("Proceed with processing?", true))) return null;

  return { pages, ticketIds, reprocess, refresh, model };
}
