import { warningDiagnostic } from './diagnostics.js';
import type { BlockLine, InlineLine, RenderContext } from './model.js';

/**
 * Block-structure builder.
 *
 * Three run-grouping passes, applied in order: blockquotes, tables, lists.
 * Each pass is a two-state machine (outside a run / inside a run): the first
 * matching line opens a run, matching lines accumulate, and the first
 * non-matching line (or end of input) flushes the run into one fragment.
 */
type QuoteFreeLine = Exclude<InlineLine, { kind: 'blockquote' }>;
type TableFreeLine = Exclude<QuoteFreeLine, { kind: 'tableRow' }>;

interface TableRow {
  line: number;
  text: string;
}

interface ListRun {
  ordered: boolean;
  line: number;
  items: string[];
}

/**
 * Group consecutive `> ` lines into one `<blockquote>`, lines joined by `<br/>`.
 */
export function groupBlockquotes(lines: InlineLine[]): QuoteFreeLine[] {
  const out: QuoteFreeLine[] = [];
  let run: string[] = [];
  let runLine = 0;

  function flush(): void {
    if (run.length === 0) return;
    out.push({ kind: 'fragment', line: runLine, html: `<blockquote>${run.join('<br/>')}</blockquote>` });
    run = [];
  }

  for (const line of lines) {
    if (line.kind === 'blockquote') {
      if (run.length === 0) runLine = line.line;
      run.push(line.content);
      continue;
    }
    flush();
    out.push(line);
  }
  flush();

  return out;
}

/**
 * Split a pipe-delimited row into trimmed cells.
 *
 * A framed row (`| a | b |`) loses its leading and trailing empty tokens. When
 * that leaves nothing, the non-empty tokens of the plain split are used instead.
 */
export function splitTableCells(row: string): string[] {
  const tokens = row.split('|').map((token) => token.trim());
  const framed = tokens.slice(1, -1);
  if (framed.length > 0) return framed;
  return tokens.filter(Boolean);
}

/**
 * Render table rows. Row 0 is the header and row 1 the separator, which is
 * dropped without being checked. Each body row keeps its own cell count.
 */
export function renderTable(rows: string[]): string {
  const headerCells = splitTableCells(rows[0] ?? '');
  const parts = [
    '<table>',
    `<thead><tr>${headerCells.map((cell) => `<th>${cell}</th>`).join('')}</tr></thead>`,
    '<tbody>',
  ];

  for (const row of rows.slice(2)) {
    const cells = splitTableCells(row);
    if (cells.length === 0) continue;
    parts.push(`<tr>${cells.map((cell) => `<td>${cell}</td>`).join('')}</tr>`);
  }

  parts.push('</tbody>', '</table>');
  return parts.join('\n');
}

/**
 * Group consecutive table rows into a `<table>`.
 *
 * A run shorter than two rows (no header + separator) is emitted as plain text.
 */
export function groupTables(lines: QuoteFreeLine[], ctx: RenderContext): TableFreeLine[] {
  const out: TableFreeLine[] = [];
  let run: TableRow[] = [];

  function flush(): void {
    const [first] = run;
    if (!first) return;

    if (run.length < 2) {
      ctx.diagnostics.push(
        warningDiagnostic('MALFORMED_TABLE', 'Table needs a header and a separator row; kept as text', first.line)
      );
      for (const row of run) out.push({ kind: 'plain', line: row.line, text: row.text });
    } else {
      out.push({ kind: 'fragment', line: first.line, html: renderTable(run.map((row) => row.text)) });
    }
    run = [];
  }

  for (const line of lines) {
    if (line.kind === 'tableRow') {
      run.push({ line: line.line, text: line.text });
      continue;
    }
    flush();
    out.push(line);
  }
  flush();

  return out;
}

/**
 * Group consecutive list items into `<ul>`/`<ol>` containers.
 *
 * Ordered and unordered items never share a container: a change of marker kind
 * closes the current list and opens a new one. Indentation is not nesting.
 */
export function groupLists(lines: TableFreeLine[]): BlockLine[] {
  const out: BlockLine[] = [];
  let run: ListRun | undefined;

  function flush(): void {
    if (!run) return;
    const tag = run.ordered ? 'ol' : 'ul';
    const items = run.items.map((item) => `<li>${item}</li>`);
    out.push({ kind: 'fragment', line: run.line, html: [`<${tag}>`, ...items, `</${tag}>`].join('\n') });
    run = undefined;
  }

  for (const line of lines) {
    if (line.kind === 'listItem') {
      if (run && run.ordered !== line.ordered) flush();
      if (!run) run = { ordered: line.ordered, line: line.line, items: [] };
      run.items.push(line.content);
      continue;
    }
    flush();
    out.push(line);
  }
  flush();

  return out;
}

export function buildBlocks(lines: InlineLine[], ctx: RenderContext): BlockLine[] {
  return groupLists(groupTables(groupBlockquotes(lines), ctx));
}
