import type { CharacterAnalysis, LookupResult } from "@/common/types/translation";

export type LookupMode = "single" | "batch";

export interface LookupPageModel {
  text: string;
  mode: LookupMode;
  includeTones: boolean;
  detailedAnalysis: boolean;
  bypassCache: boolean;
  providers: readonly string[];
  results?: readonly LookupResult[];
  error?: string;
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, character => HTML_ESCAPES[character] ?? character);
}

const STYLES = `
  body { font-family: system-ui, sans-serif; max-width: 960px; margin: 2rem auto; padding: 0 1rem; color: #222; }
  textarea { width: 100%; min-height: 6rem; font-size: 1.1rem; }
  fieldset { border: none; padding: 0; margin: 0.75rem 0; }
  table { border-collapse: collapse; width: 100%; margin-top: 1rem; }
  th, td { border: 1px solid #ccc; padding: 0.4rem 0.6rem; text-align: left; vertical-align: top; }
  .error { color: #a40000; }
  .muted { color: #666; font-size: 0.9rem; }
`;

function checkbox(name: string, label: string, checked: boolean): string {
  return `<label><input type="checkbox" name="${name}"${checked ? " checked" : ""}> ${escapeHtml(label)}</label>`;
}

function radio(mode: LookupMode, label: string, current: LookupMode): string {
  return `<label><input type="radio" name="mode" value="${mode}"${mode === current ? " checked" : ""}> ${escapeHtml(label)}</label>`;
}

function renderAnalysis(analysis: CharacterAnalysis): string {
  return [
    "<h3>Character analysis</h3>",
    "<ul>",
    `<li>Character: ${escapeHtml(analysis.character)}</li>`,
    `<li>Pinyin with tones: ${escapeHtml(analysis.romanizationWithTones)}</li>`,
    `<li>Pinyin without tones: ${escapeHtml(analysis.romanizationPlain)}</li>`,
    `<li>Tone: ${analysis.toneNumber}</li>`,
    "</ul>",
  ].join("\n");
}

function renderSingle(result: LookupResult): string {
  const parts = [
    "<section>",
    `<h2>${escapeHtml(result.sourceText)}</h2>`,
    `<p><strong>Pinyin:</strong> ${escapeHtml(result.romanization)}</p>`,
    `<p><strong>Vietnamese:</strong> ${escapeHtml(result.translation || "(unavailable)")}</p>`,
    `<p class="muted">Source: ${escapeHtml(result.translationSource)}</p>`,
  ];
  if (result.error) {
    parts.push(`<p class="error">${escapeHtml(result.error)}</p>`);
  }
  if (result.analysis) {
    parts.push(renderAnalysis(result.analysis));
  }
  parts.push("</section>");
  return parts.join("\n");
}

function renderTable(results: readonly LookupResult[]): string {
  const rows = results.map(
    (result, index) =>
      `<tr><td>${index + 1}</td><td>${escapeHtml(result.sourceText)}</td><td>${escapeHtml(result.romanization)}</td>` +
      `<td>${escapeHtml(result.translation)}</td><td>${escapeHtml(result.translationSource)}</td>` +
      `<td class="error">${escapeHtml(result.error ?? "")}</td></tr>`
  );
  return [
    "<table>",
    "<thead><tr><th>#</th><th>Text</th><th>Pinyin</th><th>Vietnamese</th><th>Source</th><th>Error</th></tr></thead>",
    `<tbody>\n${rows.join("\n")}\n</tbody>`,
    "</table>",
  ].join("\n");
}

function renderResults(model: LookupPageModel): string {
  if (model.error) {
    return `<p class="error">${escapeHtml(model.error)}</p>`;
  }
  if (!model.results || model.results.length === 0) {
    return "";
  }
  if (model.mode === "single") {
    return renderSingle(model.results[0]);
  }
  return renderTable(model.results);
}

/**
 * Server-rendered lookup form with the results of the last submission
 */
export function renderLookupPage(model: LookupPageModel): string {
  const providers = model.providers.length > 0 ? model.providers.join(" → ") : "none";

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>Chinese → Pinyin &amp; Vietnamese</title>
<style>${STYLES}</style>
</head>
<body>
<h1>Chinese → Pinyin &amp; Vietnamese</h1>
<form method="post">
<textarea name="text" placeholder="你好">${escapeHtml(model.text)}</textarea>
<fieldset>
${radio("single", "Single text", model.mode)}
${radio("batch", "One entry per line", model.mode)}
</fieldset>
<fieldset>
${checkbox("includeTones", "Tone marks", model.includeTones)}
${checkbox("detailedAnalysis", "Character analysis", model.detailedAnalysis)}
${checkbox("bypassCache", "Skip cache", model.bypassCache)}
</fieldset>
<button type="submit">Look up</button>
</form>
${renderResults(model)}
<p class="muted">Translation providers: ${escapeHtml(providers)}</p>
</body>
</html>
`;
}
