import type { ToolConfig } from "../config/types.js";

export function formatToolList(tools: readonly ToolConfig[], format: "pretty" | "json"): string {
  if (format === "json") return JSON.stringify({ tools }, null, 2);
  if (tools.length === 0) return "no tools registered";

  return tools
    .map((t) => [t.name, `(${t.dialect})`, t.path, ...t.args].join(" "))
    .join("\n");
}
