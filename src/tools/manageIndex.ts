import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { CareerAssistantService } from "../services/careerAssistantService.js";
import { jsonResult } from "./result.js";

export function registerCollectionStatsTool(server: McpServer, service: CareerAssistantService) {
  server.registerTool(
    "collection_stats",
    {
      title: "Collection Stats",
      description: "Reports the vector collection name and how many passages it holds.",
      inputSchema: {},
    },
    async () => jsonResult(await service.getStats()),
  );
}

export function registerResetIndexTool(server: McpServer, service: CareerAssistantService) {
  server.registerTool(
    "reset_index",
    {
      title: "Reset Index",
      description: "Deletes every indexed passage and recreates an empty collection.",
      inputSchema: {},
    },
    async () => jsonResult(await service.resetIndex()),
  );
}
