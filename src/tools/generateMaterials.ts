import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { ApplicationRequest, ARTIFACT_TYPES } from "../domain/types.js";
import { CareerAssistantService } from "../services/careerAssistantService.js";
import { jsonResult } from "./result.js";

const requestShape = {
  job_description: z.string().min(1).describe("Full job description text"),
  company_name: z.string().default("").describe("Hiring company"),
  role_title: z.string().default("").describe("Role being applied for"),
  candidate_name: z.string().default("").describe("Candidate's name"),
  resume_content: z
    .string()
    .optional()
    .describe("Resume text for the ATS report; indexed documents are used when omitted"),
};

interface RequestArgs {
  job_description: string;
  company_name: string;
  role_title: string;
  candidate_name: string;
  resume_content?: string;
}

function toApplicationRequest(args: RequestArgs): ApplicationRequest {
  return {
    jobDescription: args.job_description,
    companyName: args.company_name,
    roleTitle: args.role_title,
    candidateName: args.candidate_name,
    resumeContent: args.resume_content,
  };
}

export function registerGenerateArtifactTool(server: McpServer, service: CareerAssistantService) {
  server.registerTool(
    "generate_artifact",
    {
      title: "Generate Artifact",
      description:
        "Drafts one application artifact (resume bullets, cover letter, ATS report or LinkedIn message) from indexed background.",
      inputSchema: {
        artifact: z.enum(ARTIFACT_TYPES).describe("Artifact to generate"),
        ...requestShape,
      },
    },
    async ({ artifact, ...args }) => {
      const text = await service.generate(artifact, toApplicationRequest(args));
      return jsonResult({ artifact, text });
    },
  );
}

export function registerGenerateApplicationKitTool(
  server: McpServer,
  service: CareerAssistantService,
) {
  server.registerTool(
    "generate_application_kit",
    {
      title: "Generate Application Kit",
      description: "Drafts all four application artifacts for one job description.",
      inputSchema: requestShape,
    },
    async (args) => jsonResult(await service.generateAll(toApplicationRequest(args))),
  );
}
