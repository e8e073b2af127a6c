import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { CareerAssistantService } from "./services/careerAssistantService.js";
import { registerGenerateApplicationKitTool, registerGenerateArtifactTool } from "./tools/generateMaterials.js";
import {
  registerIndexDocumentsTool,
  registerIndexTextTool,
  registerIndexUploadsTool,
} from "./tools/indexDocuments.js";
import { registerCollectionStatsTool, registerResetIndexTool } from "./tools/manageIndex.js";
import { registerSearchPassagesTool } from "./tools/searchPassages.js";

export const SERVER_NAME = "career-rag-assistant";
export const SERVER_VERSION = "0.1.0";

export function createAppServer(service: CareerAssistantService): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns basic server status.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) => {
      const who = name?.trim() || "anonymous";
      return {
        content: [
          {
            type: "text",
            text: `${SERVER_NAME} is running. hello ${who}`,
          },
        ],
      };
    },
  );

  registerIndexDocumentsTool(server, service);
  registerIndexTextTool(server, service);
  registerIndexUploadsTool(server, service);
  registerSearchPassagesTool(server, service);
  registerCollectionStatsTool(server, service);
  registerResetIndexTool(server, service);
  registerGenerateArtifactTool(server, service);
  registerGenerateApplicationKitTool(server, service);

  return server;
}
