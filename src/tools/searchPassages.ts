import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { CareerAssistantService } from "../services/careerAssistantService.js";
import { jsonResult } from "./result.js";

export function registerSearchPassagesTool(server: McpServer, service: CareerAssistantService) {
  server.registerTool(
    "search_passages",
    {
      title: "Search Passages",
      description: "Returns the indexed passages nearest to a query, best match first.",
      inputSchema: {
        query: z.string().min(2).describe("Search query"),
        limit: z.number().int().min(1).max(20).optional().describe("Max passages"),
      },
    },
    async ({ query, limit }) => {
      const results = await service.searchPassages(query, limit ?? 5);
      return jsonResult({
        query,
        hits: results.map((result) => ({
          id: result.id,
          distance: result.distance === null ? null : Number(result.distance.toFixed(4)),
          filename: result.metadata.filename,
          chunk_index: result.metadata.chunkIndex,
          snippet: result.text.slice(0, 240),
        })),
      });
    },
  );
}
