// src/ui/render.ts
// What: Server-rendered HTML for the browser UI.
// How: Plain template strings; every dynamic value goes through escapeHtml(). Forms post back to /ui/* routes,
//      so the page works without client-side scripts.

import path from 'path';
import { DocumentSummary, PassageMetadata, SearchMatch } from '../models/types.js';

export type NoticeKind = 'success' | 'error' | 'warning' | 'info';

export interface Notice {
  kind: NoticeKind;
  message: string;
}

export interface PageModel {
  notices: Notice[];
  query: string;
  topK: number;
  maxTopK: number;
  results?: SearchMatch[];
  documents?: DocumentSummary[]; // present when the document list is shown
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function formatRelevance(score: number): string {
  return `${(score * 100).toFixed(1)}%`;
}

export function formatSize(bytes: number): string {
  if (bytes >= 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024))}MB`;
  if (bytes >= 1024) return `${Math.floor(bytes / 1024)}KB`;
  return `${bytes} bytes`;
}

/** Human-readable source details for a passage, page first. */
export function describeMetadata(meta: PassageMetadata): string[] {
  const lines: string[] = [];
  if (meta.page !== undefined) lines.push(`Page: ${meta.page}`);
  if (meta.source) lines.push(`File: ${path.basename(meta.source)}`);
  if (meta.creator) lines.push(`Creator: ${meta.creator}`);
  if (meta.creation_date) {
    // ISO dates show as YYYY-MM-DD; anything else as stored
    const day = /^\d{4}-\d{2}-\d{2}T/.test(meta.creation_date) ? meta.creation_date.slice(0, 10) : meta.creation_date;
    lines.push(`Created: ${day}`);
  }
  return lines;
}

function renderNotices(notices: Notice[]): string {
  return notices
    .map((n) => `<div class="notice ${n.kind}" role="${n.kind === 'error' ? 'alert' : 'status'}">${escapeHtml(n.message)}</div>`)
    .join('\n');
}

function renderResults(query: string, results: SearchMatch[]): string {
  if (results.length === 0) {
    return '<p class="empty">No relevant results found. Try a different query.</p>';
  }
  const items = results
    .map((r, i) => {
      const details = describeMetadata(r.metadata)
        .map((line) => `<li>${escapeHtml(line)}</li>`)
        .join('');
      return `<article class="result">
  <h3>Result ${i + 1} (Relevance: ${formatRelevance(r.score)})</h3>
  <div class="columns">
    <div class="content"><p>${escapeHtml(r.content)}</p></div>
    <aside class="source"><h4>Source details</h4><ul>${details}</ul></aside>
  </div>
</article>`;
    })
    .join('\n');
  return `<h2>Search results for &ldquo;${escapeHtml(query)}&rdquo;</h2>\n${items}`;
}

function renderDocuments(documents: DocumentSummary[]): string {
  if (documents.length === 0) {
    return '<section id="documents"><h2>All documents</h2><p class="empty">No documents uploaded yet.</p></section>';
  }
  const rows = documents
    .map(
      (d) => `<tr>
  <td><input type="checkbox" name="ids" value="${escapeHtml(d.id)}" aria-label="Select ${escapeHtml(d.filename)}"></td>
  <td>${escapeHtml(d.filename)}</td>
  <td><code>${escapeHtml(d.id)}</code></td>
  <td>${d.content_type === 'application/pdf' ? 'PDF' : 'Text'}</td>
  <td>${d.passage_count}</td>
  <td>${escapeHtml(d.created_at)}</td>
</tr>`,
    )
    .join('\n');
  return `<section id="documents">
<h2>All documents (${documents.length})</h2>
<form method="post" action="/ui/documents/delete">
<button type="submit">Delete selected documents</button>
<table>
<thead><tr><th></th><th>File</th><th>Id</th><th>Type</th><th>Passages</th><th>Uploaded</th></tr></thead>
<tbody>
${rows}
</tbody>
</table>
</form>
</section>`;
}

export function renderPage(model: PageModel): string {
  const showDocuments = model.documents !== undefined;
  const toggle = showDocuments
    ? '<a href="/">Hide documents</a>'
    : '<a href="/?show=documents">View all documents</a>';
  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>Document Search Engine</title>
<style>
body { font-family: system-ui, sans-serif; margin: 0; display: flex; }
nav { width: 16rem; padding: 1rem; background: #f3f4f6; min-height: 100vh; }
main { flex: 1; padding: 1rem 2rem; max-width: 60rem; }
.notice { padding: .5rem .75rem; margin: .5rem 0; border-radius: 4px; }
.notice.success { background: #dcfce7; } .notice.error { background: #fee2e2; }
.notice.warning { background: #fef9c3; } .notice.info { background: #e0f2fe; }
.result { border: 1px solid #e5e7eb; border-radius: 4px; padding: .5rem 1rem; margin: .75rem 0; }
.columns { display: flex; gap: 1rem; } .content { flex: 2; } .source { flex: 1; }
table { border-collapse: collapse; width: 100%; } td, th { border-bottom: 1px solid #e5e7eb; padding: .25rem .5rem; text-align: left; }
</style>
</head>
<body>
<nav>
<h2>Database management</h2>
<p>${toggle}</p>
<hr>
<h3>Clear database</h3>
<form method="post" action="/ui/documents/clear">
<label><input type="checkbox" name="confirm"> I understand this will delete ALL documents</label>
<p><button type="submit">Clear entire database</button></p>
</form>
</nav>
<main>
<h1>Document Search Engine</h1>
${renderNotices(model.notices)}
${showDocuments && model.documents ? renderDocuments(model.documents) : ''}
<section id="upload">
<h2>Upload documents</h2>
<form method="post" action="/ui/upload" enctype="multipart/form-data">
<input type="file" name="files" multiple accept=".txt,.md,.pdf,text/plain,application/pdf">
<button type="submit">Upload</button>
</form>
</section>
<section id="search">
<h2>Search documents</h2>
<form method="get" action="/">
<input type="search" name="q" value="${escapeHtml(model.query)}" placeholder="Enter your search query" size="50">
<label>Number of results <input type="number" name="k" min="1" max="${model.maxTopK}" value="${model.topK}"></label>
<button type="submit">Search</button>
</form>
${model.results ? renderResults(model.query, model.results) : ''}
</section>
</main>
</body>
</html>
`;
}
