import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { CareerAssistantService } from "../services/careerAssistantService.js";
import { jsonResult } from "./result.js";

export function registerIndexDocumentsTool(server: McpServer, service: CareerAssistantService) {
  server.registerTool(
    "index_documents",
    {
      title: "Index Documents",
      description:
        "Extracts, chunks and embeds local .pdf/.docx/.txt career documents. Without paths, indexes the configured documents folder.",
      inputSchema: {
        paths: z.array(z.string()).min(1).optional().describe("File paths to index"),
        folder: z.string().optional().describe("Folder to index instead of explicit paths"),
      },
    },
    async ({ paths, folder }) => {
      const result = paths ? await service.indexFiles(paths) : await service.indexFolder(folder);
      return jsonResult(result);
    },
  );
}

export function registerIndexTextTool(server: McpServer, service: CareerAssistantService) {
  server.registerTool(
    "index_text",
    {
      title: "Index Text",
      description: "Indexes pasted career notes or resume text without touching the filesystem.",
      inputSchema: {
        documents: z
          .array(
            z.object({
              filename: z.string().min(1).describe("Name used as the passage id prefix"),
              content: z.string().describe("Plain text content"),
            }),
          )
          .min(1),
      },
    },
    async ({ documents }) => jsonResult(await service.indexRawDocuments(documents)),
  );
}

export function registerIndexUploadsTool(server: McpServer, service: CareerAssistantService) {
  server.registerTool(
    "index_uploads",
    {
      title: "Index Uploads",
      description:
        "Indexes uploaded .pdf/.docx/.txt files sent as base64, extracted the same way as files on disk.",
      inputSchema: {
        files: z
          .array(
            z.object({
              filename: z.string().min(1).describe("Original file name; its extension selects the parser"),
              content_base64: z.string().min(1).describe("File bytes, base64 encoded"),
            }),
          )
          .min(1),
      },
    },
    async ({ files }) =>
      jsonResult(
        await service.indexUploadedDocuments(
          files.map((file) => ({ filename: file.filename, contentBase64: file.content_base64 })),
        ),
      ),
  );
}
