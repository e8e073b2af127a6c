import { errorMessage, PromptTemplateError } from "../domain/errors.js";
import {
  ApplicationRequest,
  ArtifactType,
  GenerationResults,
} from "../domain/types.js";
import { CompletionClient } from "../infra/ai/types.js";
import { renderPrompt } from "../pipelines/promptTemplates.js";
import type { Logger } from "../utils/logger.js";
import { Retriever } from "./retriever.js";

export const CONTEXT_LIMIT = 5;
export const ATS_FALLBACK_CONTEXT_LIMIT = 10;
export const ATS_FALLBACK_QUERY = "resume work experience projects skills education background";
export const RESUME_NOT_PROVIDED = "Resume content not provided for ATS analysis.";
export const ACHIEVEMENT_FALLBACK = "relevant experience in the field";

export interface ApplicationGeneratorOptions {
  retriever: Retriever;
  completion: CompletionClient;
  logger: Logger;
}

/**
 * Drafts each application artifact from retrieved background passages. Each
 * operation can be re-run on its own; runtime failures come back as
 * "Error: ..." text for that artifact only.
 */
export class ApplicationGenerator {
  private readonly retriever: Retriever;

  private readonly completion: CompletionClient;

  private readonly logger: Logger;

  constructor(options: ApplicationGeneratorOptions) {
    this.retriever = options.retriever;
    this.completion = options.completion;
    this.logger = options.logger;
  }

  async generateResumeBullets(jobDescription: string, candidateName: string): Promise<string> {
    return this.runArtifact("resume_bullets", async () => {
      const context = await this.retriever.retrieveContext(jobDescription, CONTEXT_LIMIT);
      return renderPrompt("resume_bullets", {
        job_description: jobDescription,
        context,
        name: candidateName,
      });
    });
  }

  async generateCoverLetter(
    jobDescription: string,
    companyName: string,
    roleTitle: string,
  ): Promise<string> {
    return this.runArtifact("cover_letter", async () => {
      const context = await this.retriever.retrieveContext(jobDescription, CONTEXT_LIMIT);
      return renderPrompt("cover_letter", {
        job_description: jobDescription,
        company_name: companyName,
        role_title: roleTitle,
        context,
      });
    });
  }

  async generateAtsAnalysis(jobDescription: string, resumeContent = ""): Promise<string> {
    return this.runArtifact("ats_analysis", async () => {
      let resume = resumeContent;
      if (!resume.trim() || resume === RESUME_NOT_PROVIDED) {
        this.logger.info("no resume content supplied, assembling it from indexed documents");
        resume = await this.retriever.retrieveContext(
          ATS_FALLBACK_QUERY,
          ATS_FALLBACK_CONTEXT_LIMIT,
        );
      }

      return renderPrompt("ats_analysis", {
        job_description: jobDescription,
        resume_content: resume,
      });
    });
  }

  async generateLinkedinMessage(
    jobDescription: string,
    companyName: string,
    roleTitle: string,
  ): Promise<string> {
    return this.runArtifact("linkedin_message", async () => {
      const [topMatch] = await this.retriever.retrieve(jobDescription, 1);
      return renderPrompt("linkedin_message", {
        job_description: jobDescription,
        company_name: companyName,
        role_title: roleTitle,
        achievement: topMatch?.text ?? ACHIEVEMENT_FALLBACK,
      });
    });
  }

  async generate(type: ArtifactType, request: ApplicationRequest): Promise<string> {
    switch (type) {
      case "resume_bullets":
        return this.generateResumeBullets(request.jobDescription, request.candidateName);
      case "cover_letter":
        return this.generateCoverLetter(
          request.jobDescription,
          request.companyName,
          request.roleTitle,
        );
      case "ats_analysis":
        return this.generateAtsAnalysis(request.jobDescription, request.resumeContent ?? "");
      case "linkedin_message":
        return this.generateLinkedinMessage(
          request.jobDescription,
          request.companyName,
          request.roleTitle,
        );
    }
  }

  async generateAll(request: ApplicationRequest): Promise<GenerationResults> {
    this.logger.info("generating all application materials");

    return {
      resume_bullets: await this.generate("resume_bullets", request),
      cover_letter: await this.generate("cover_letter", request),
      ats_analysis: await this.generate("ats_analysis", request),
      linkedin_message: await this.generate("linkedin_message", request),
    };
  }

  private async runArtifact(
    type: ArtifactType,
    buildPrompt: () => Promise<string>,
  ): Promise<string> {
    this.logger.info({ artifact: type }, "generating artifact");
    try {
      const prompt = await buildPrompt();
      const output = await this.completion.complete(prompt);
      this.logger.info({ artifact: type }, "artifact generated");
      return output;
    } catch (error) {
      if (error instanceof PromptTemplateError) {
        throw error;
      }
      this.logger.error({ artifact: type, err: errorMessage(error) }, "artifact generation failed");
      return `Error: ${errorMessage(error)}`;
    }
  }
}
