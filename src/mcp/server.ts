import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { readSettings } from "../core/config.js";
import { IssueCatalog } from "../core/catalog.js";
import { ConversationCache } from "../core/cache.js";
import { VERSION } from "../version.js";
import type { Issue } from "../types.js";

export interface McpServerOptions {
  dbPath?: string;
}

export function formatIssueLine(issue: Issue): string {
  const tickets = issue.tickets.length === 1 ? "1 ticket" : `${issue.tickets.length} tickets`;
  return `${issue.issue_id} [${issue.category}] ${issue.short_description} (${tickets})`;
}

/**
 * Register the read-only catalog tools. The catalog file is re-read on every
 * call so a concurrent `process` run shows up without a restart.
 */
export function createMcpServer(dbPath: string, cache: ConversationCache): McpServer {
  const server = new McpServer(
    { name: "ticketcluster", version: VERSION },
    {
      instructions:
        "Read-only access to the support issue catalog. Use list_issues to browse known issues, get_issue for the full record including resolution steps, and find_ticket to see which issue a helpdesk ticket was linked to.",
    }
  );

  server.tool(
    "list_issues",
    "List known support issues, optionally filtered by category or keyword.",
    {
      category: z.string().optional().describe("Exact category name, e.g. 'Mobile App'."),
      keyword: z.string().optional().describe("Case-insensitive text matched against description, root cause and keywords."),
    },
    async ({ category, keyword }) => {
      const catalog = IssueCatalog.load(dbPath);
      const needle = keyword?.toLowerCase();
      const matches = catalog.issues.filter((issue) => {
        if (category && issue.category !== category) return false;
        if (!needle) return true;
        const haystack = [issue.short_description, issue.root_cause, ...issue.keywords].join(" ").toLowerCase();
        return haystack.includes(needle);
      });

      if (matches.length === 0) {
        return { content: [{ type: "text" as const, text: "No matching issues." }] };
      }
      return {
        content: [{ type: "text" as const, text: matches.map(formatIssueLine).join("\n") }],
      };
    }
  );

  server.tool(
    "get_issue",
    "Get the full record for one issue, including resolution steps and linked tickets.",
    {
      issue_id: z.string().describe("Issue id, e.g. 'ISSUE-0003' or 'ISSUE-0003-1'."),
    },
    async ({ issue_id }) => {
      const issue = IssueCatalog.load(dbPath).findById(issue_id);
      if (!issue) {
        return { content: [{ type: "text" as const, text: `No issue found with id: ${issue_id}` }] };
      }
      return { content: [{ type: "text" as const, text: JSON.stringify(issue, null, 2) }] };
    }
  );

  server.tool(
    "find_ticket",
    "Find which issue a helpdesk ticket is linked to.",
    {
      ticket_id: z.number().int().describe("Helpdesk ticket id."),
    },
    async ({ ticket_id }) => {
      const issue = IssueCatalog.load(dbPath).findByTicket(ticket_id);
      if (issue) {
        return { content: [{ type: "text" as const, text: formatIssueLine(issue) }] };
      }
      const reason = cache.isIgnored(ticket_id)
        ? "it is marked as ignored"
        : cache.load(ticket_id)
          ? "it has not been classified yet"
          : "it has not been fetched";
      return {
        content: [{ type: "text" as const, text: `Ticket ${ticket_id} is not linked to any issue: ${reason}.` }],
      };
    }
  );

  return server;
}

export async function startMcpServer(options: McpServerOptions = {}): Promise<void> {
  const settings = readSettings();
  const dbPath = options.dbPath ?? settings.defaultDbPath;
  const cache = new ConversationCache(settings.conversationsDir, settings.autoIgnorePhrases);

  // Fail at startup rather than on the first tool call.
  IssueCatalog.load(dbPath);

  const server = createMcpServer(dbPath, cache);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  process.stderr.write(`ticketcluster: MCP server ready (catalog: ${dbPath})\n`);
}
