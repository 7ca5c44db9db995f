import { readSettings } from "../core/config.js";
import { IssueCatalog } from "../core/catalog.js";

export function inspectCommand(options: { output?: string; category?: string }): void {
  const settings = readSettings();
  const catalog = IssueCatalog.load(options.output ?? settings.defaultDbPath);
  const issues = options.category
    ? catalog.issues.filter((issue) => issue.category.toLowerCase() === options.category?.toLowerCase())
    : catalog.issues;

  if (issues.length === 0) {
    console.log("No issues stored.");
    return;
  }

  console.log(`${issues.length} issue(s):\n`);
  for (const issue of issues) {
    console.log(`  ${issue.issue_id}`);
    console.log(`    Category:    ${issue.category}`);
    console.log(`    Summary:     ${issue.short_description}`);
    console.log(`    Root cause:  ${issue.root_cause}`);
    console.log(`    Keywords:    ${issue.keywords.join(", ")}`);
    console.log(`    Confidence:  ${issue.confidence}`);
    console.log(`    Tickets:     ${issue.tickets.join(", ")}`);
    console.log();
  }
}
