import { PromptTemplateError } from "../domain/errors.js";

interface PromptDefinition {
  fields: readonly string[];
  template: string;
}

const RESUME_BULLETS_TEMPLATE = `You are an expert resume writer who produces concise, ATS-optimized resume bullet points.

Job description:
{job_description}

Candidate background (retrieved from their documents):
{context}

Candidate name: {name}

Rewrite the candidate's experience and project bullets so they target the job description above.
- Start every bullet with a strong action verb.
- Quantify impact wherever the background supports it; never invent numbers.
- Weave in keywords from the job description naturally.
- Keep each bullet to one or two lines.

Group the bullets under WORK EXPERIENCE and PROJECTS, one heading per role or project, using "•" for bullets.`;

const COVER_LETTER_TEMPLATE = `You are an experienced career coach writing a personalized cover letter.

Company: {company_name}
Role: {role_title}

Job description:
{job_description}

Candidate background (retrieved from their documents):
{context}

Write a cover letter of three to four short paragraphs:
1. An opening that names the role and shows genuine interest in {company_name}.
2. One or two paragraphs connecting specific achievements from the background to the job's requirements.
3. A closing that restates fit and invites a conversation.

Use a confident, professional tone. Do not invent experience that is not in the background.`;

const ATS_ANALYSIS_TEMPLATE = `You are an Applicant Tracking System (ATS) analyst.

Job description:
{job_description}

Candidate resume content:
{resume_content}

Produce an ATS compatibility report with these sections:
MATCH SCORE: an estimated percentage from 0 to 100 with one sentence of justification.
MATCHED KEYWORDS: skills and terms from the job description that appear in the resume.
MISSING KEYWORDS: important skills and terms from the job description that are absent.
RECOMMENDATIONS: three to five concrete edits that would raise the score.`;

const LINKEDIN_MESSAGE_TEMPLATE = `You are helping a candidate write a short LinkedIn connection message to a recruiter or hiring manager.

Company: {company_name}
Role: {role_title}

Job description:
{job_description}

Key achievement to mention:
{achievement}

Write a friendly, professional message under 300 characters that mentions the role, references the achievement briefly and asks to connect. No hashtags or emojis.`;

export const PROMPT_TEMPLATES = {
  resume_bullets: {
    fields: ["job_description", "context", "name"],
    template: RESUME_BULLETS_TEMPLATE,
  },
  cover_letter: {
    fields: ["job_description", "company_name", "role_title", "context"],
    template: COVER_LETTER_TEMPLATE,
  },
  ats_analysis: {
    fields: ["job_description", "resume_content"],
    template: ATS_ANALYSIS_TEMPLATE,
  },
  linkedin_message: {
    fields: ["job_description", "company_name", "role_title", "achievement"],
    template: LINKEDIN_MESSAGE_TEMPLATE,
  },
} as const satisfies Record<string, PromptDefinition>;

export type PromptName = keyof typeof PROMPT_TEMPLATES;

export type PromptFields<N extends PromptName> = Record<
  (typeof PROMPT_TEMPLATES)[N]["fields"][number],
  string
>;

const PLACEHOLDER = /\{([a-z_]+)\}/g;

export function isPromptName(name: string): name is PromptName {
  return Object.prototype.hasOwnProperty.call(PROMPT_TEMPLATES, name);
}

export function renderPrompt<N extends PromptName>(name: N, fields: PromptFields<N>): string {
  return renderNamedPrompt(name, fields);
}

/**
 * Untyped entry point for callers that only know the template name at run
 * time. Validation happens before any substitution.
 */
export function renderNamedPrompt(
  name: string,
  fields: Readonly<Record<string, unknown>>,
): string {
  if (!isPromptName(name)) {
    throw new PromptTemplateError(`Unknown prompt template: ${name}`, name);
  }

  const definition: PromptDefinition = PROMPT_TEMPLATES[name];
  const missing = definition.fields.filter((field) => typeof fields[field] !== "string");
  if (missing.length > 0) {
    throw new PromptTemplateError(
      `Prompt template "${name}" is missing required field(s): ${missing.join(", ")}`,
      name,
      missing,
    );
  }

  return definition.template.replace(PLACEHOLDER, (placeholder: string, key: string) => {
    const value = fields[key];
    return typeof value === "string" ? value : placeholder;
  });
}
