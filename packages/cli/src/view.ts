/**
 * HTML overview of an inventory (Tailwind, hacker theme: black + green, red for failures).
 */

import type { ErrorEntry, InventorySummary } from "@conninv/core";
import { escapeHtml } from "./utils";

const TAILWIND_CDN =
  '<script src="https://cdn.tailwindcss.com"></script>';

function layout(title: string, bodyContent: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
  ${TAILWIND_CDN}
</head>
<body class="bg-black text-green-400 font-mono min-h-screen antialiased">
  <div class="max-w-6xl mx-auto px-4 py-8">
    ${bodyContent}
  </div>
</body>
</html>`;
}

function card(value: number, label: string, tone = "green"): string {
  return `
      <div class="bg-black border border-${tone}-800 rounded p-4">
        <div class="text-2xl font-bold text-${tone}-400">${value}</div>
        <div class="text-${tone}-600 text-sm mt-1">${escapeHtml(label)}</div>
      </div>`;
}

function table(headers: readonly string[], rows: readonly (readonly string[])[], empty: string): string {
  const head = headers
    .map((h) => `<th class="px-4 py-3 text-left text-green-400 font-semibold">${escapeHtml(h)}</th>`)
    .join("");
  const body =
    rows.length === 0
      ? `<tr><td colspan="${headers.length}" class="px-4 py-2 text-green-600">${escapeHtml(empty)}</td></tr>`
      : rows
          .map(
            (row) =>
              `<tr class="border-b border-green-800 hover:bg-green-950/30">${row
                .map((cell) => `<td class="px-4 py-2">${escapeHtml(cell)}</td>`)
                .join("")}</tr>`,
          )
          .join("");
  return `
    <div class="border border-green-800 rounded overflow-hidden mb-6">
      <table class="w-full text-sm">
        <thead><tr class="bg-green-950 border-b border-green-800">${head}</tr></thead>
        <tbody>${body}</tbody>
      </table>
    </div>`;
}

function section(title: string, content: string): string {
  return `<h2 class="text-lg font-semibold text-green-400 mb-3">${escapeHtml(title)}</h2>${content}`;
}

export function generateInventoryHTML(
  inventory: InventorySummary,
  options: { documents: number; errors: readonly ErrorEntry[] },
): string {
  const { summary } = inventory;

  const lists = (
    [
      ["Servers", inventory.servers],
      ["Databases", inventory.databases],
      ["Schemas", inventory.schemas],
      ["Tables", inventory.tables],
      ["Sources", inventory.sources],
    ] as const
  )
    .map(
      ([title, values]) => `
      <div class="border border-green-800 rounded p-4">
        <div class="text-green-600 text-sm mb-2">${title}</div>
        <ul class="text-green-300 text-sm">${
          values.length > 0
            ? values.map((v) => `<li>${escapeHtml(v)}</li>`).join("")
            : "<li>none</li>"
        }</ul>
      </div>`,
    )
    .join("");

  const body = `
    <h1 class="text-2xl font-bold text-green-400 mb-2">Workbook Connection Inventory</h1>
    <p class="text-green-600 mb-6">${options.documents} document(s) scanned</p>

    <div class="grid grid-cols-2 md:grid-cols-6 gap-4 mb-6">
      ${card(summary.totalServers, "Servers")}
      ${card(summary.totalDatabases, "Databases")}
      ${card(summary.totalSchemas, "Schemas")}
      ${card(summary.totalTables, "Tables")}
      ${card(summary.totalSources, "Sources")}
      ${card(options.errors.length, "Failed documents", options.errors.length > 0 ? "red" : "green")}
    </div>

    <div class="grid md:grid-cols-5 gap-4 mb-6">${lists}</div>

    ${section(
      "Connection Mappings",
      table(
        ["File", "Connection", "Kind", "Server", "Database", "Provider"],
        inventory.connectionMappings.map((m) => [
          m.file,
          m.connectionName,
          m.connectionKind,
          m.server ?? "",
          m.database ?? "",
          m.provider ?? "",
        ]),
        "No connections with a server or database",
      ),
    )}

    ${section(
      "Query Mappings",
      table(
        ["File", "Query", "Servers", "Databases", "Schemas", "Tables", "Sources"],
        inventory.queryMappings.map((m) => [
          m.file,
          m.positionallyAligned ? m.queryName : `${m.queryName} (unaligned)`,
          m.servers.join(", "),
          m.databases.join(", "),
          m.schemas.join(", "),
          m.tables.join(", "),
          m.sources.join(", "),
        ]),
        "No queries with data sources",
      ),
    )}

    ${
      options.errors.length > 0
        ? section(
            "Failures",
            table(
              ["File", "Kind", "Message"],
              options.errors.map((e) => [e.file, e.kind, e.message ?? ""]),
              "",
            ),
          )
        : ""
    }
  `;

  return layout("Workbook Connection Inventory", body);
}
