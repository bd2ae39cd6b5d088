import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import * as z from 'zod';
import type { ReportConfig } from './config.js';
import { extractReportToc, previewReportBody, renderReport } from './report/api.js';
import { REPORT_VERSION } from './report/constants.js';
import { imageDescriptorSchema } from './report/descriptors.js';

const diagnosticSchema = z.object({
  severity: z.enum(['error', 'warning']),
  code: z.string(),
  message: z.string(),
  line: z.number().optional(),
});

const tocEntrySchema = z.object({
  title: z.string(),
  anchor: z.string(),
  depth: z.number(),
});

/**
 * Create an MCP server instance and register all tools.
 *
 * Tool naming convention:
 * - `report.render` renders a complete document (optionally writing it).
 * - `report.preview` renders the body only.
 * - `report.toc` extracts the table of contents.
 *
 * `content` is markdown text or a path relative to the configured root.
 */
export const SERVER_NAME = 'research-report-mcp';

export function createMcpServer(config: ReportConfig): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: REPORT_VERSION });

  server.registerTool(
    'report.render',
    {
      title: 'Render a report',
      description:
        'Render markdown into a self-contained, print-ready HTML report. If outputPath is given the HTML is written there (".pdf" targets are written as ".html").',
      inputSchema: {
        title: z.string(),
        content: z.string(),
        figures: z.array(imageDescriptorSchema).optional(),
        diagrams: z.array(imageDescriptorSchema).optional(),
        author: z.string().optional(),
        date: z.string().optional(),
        includeToc: z.boolean().optional(),
        outputPath: z.string().optional(),
      },
      outputSchema: {
        html: z.string().optional(),
        outputPath: z.string().optional(),
        toc: z.array(tocEntrySchema),
        warnings: z.array(diagnosticSchema),
      },
    },
    async ({ title, content, figures, diagrams, author, date, includeToc, outputPath }) => {
      const result = await renderReport(config, {
        title,
        content,
        figures,
        diagrams,
        author,
        date,
        includeToc,
        outputPath,
      });
      // Written reports are not echoed back; the HTML embeds every image.
      const structured =
        result.outputPath === undefined
          ? { html: result.html, toc: result.toc, warnings: result.warnings }
          : { outputPath: result.outputPath, toc: result.toc, warnings: result.warnings };
      return {
        content: [{ type: 'text', text: JSON.stringify(structured, null, 2) }],
        structuredContent: structured,
      };
    }
  );

  server.registerTool(
    'report.preview',
    {
      title: 'Preview a report body',
      description: 'Render markdown into the HTML body of a report (contents block + content) without the surrounding document.',
      inputSchema: {
        content: z.string(),
        includeToc: z.boolean().optional(),
      },
      outputSchema: {
        html: z.string(),
        warnings: z.array(diagnosticSchema),
      },
    },
    async ({ content, includeToc }) => {
      const preview = await previewReportBody(config, { content, includeToc });
      return {
        content: [{ type: 'text', text: JSON.stringify(preview, null, 2) }],
        structuredContent: preview,
      };
    }
  );

  server.registerTool(
    'report.toc',
    {
      title: 'Extract the table of contents',
      description: 'List the "##"/"###" headings of a report with the unique anchors they are bound to.',
      inputSchema: {
        content: z.string(),
      },
      outputSchema: {
        entries: z.array(tocEntrySchema),
        markdown: z.string(),
      },
    },
    async ({ content }) => {
      const { entries, markdown } = await extractReportToc(config, { content });
      return {
        content: [{ type: 'text', text: JSON.stringify({ entries, markdown }, null, 2) }],
        structuredContent: { entries, markdown },
      };
    }
  );

  return server;
}

/**
 * Connect the MCP server to stdio transport and start serving requests.
 *
 * This function does not return until the transport closes.
 */
export async function runStdioServer(config: ReportConfig): Promise<void> {
  const server = createMcpServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
