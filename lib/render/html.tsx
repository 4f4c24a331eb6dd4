import { renderToStaticMarkup } from "react-dom/server";
import type { DashboardModel } from "@/lib/dashboard/build";
import { Dashboard } from "@/components/dashboard/Dashboard";
import { OPTA_STYLES } from "./styles";

function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}

// Full standalone page; the body is static markup, no client bundle
export function renderDashboardHtml(model: DashboardModel): string {
  const body = renderToStaticMarkup(<Dashboard model={model} />);
  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="utf-8" />',
    '<meta name="viewport" content="width=device-width, initial-scale=1" />',
    `<title>${escapeHtml(model.title)}</title>`,
    `<style>${OPTA_STYLES}</style>`,
    "</head>",
    `<body>${body}</body>`,
    "</html>",
    "",
  ].join("\n");
}
