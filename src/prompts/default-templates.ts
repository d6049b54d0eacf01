export const CHUNK_SUMMARY_PROMPT = 'chunk_summary_prompt';
export const FINAL_SUMMARY_PROMPT = 'final_summary_prompt';
export const FINAL_SUMMARY_PROMPT_VIDEO = 'final_summary_prompt_video';

const DEFAULT_CHUNK_TEMPLATE = `You are an expert academic summarizer. Summarize the following content for a study note, focusing on key concepts, main arguments, and actionable insights. Use clear, concise language suitable for graduate-level students.

{{chunk_context}}
Content:
{{content}}`;

const DEFAULT_FINAL_TEMPLATE = `You are an expert academic summarizer. Write a comprehensive summary of the following material, synthesizing its main points, arguments, and conclusions. Highlight the most important takeaways and any recommended next steps.

Content:
{{content}}`;

const DEFAULT_VIDEO_FINAL_TEMPLATE = `You summarize educational video material. Write a final summary in markdown with these sections:

# Video Summary (AI Generated)

## Topics Covered
- Three to five main topics, as specific bullet points

## Key Concepts
- The ideas a viewer should retain, each with a one-line explanation

## Takeaways
- Practical conclusions or next steps

Content:
{{content}}`;

const DEFAULT_TEMPLATES: Readonly<Record<string, string>> = {
  [CHUNK_SUMMARY_PROMPT]: DEFAULT_CHUNK_TEMPLATE,
  [FINAL_SUMMARY_PROMPT]: DEFAULT_FINAL_TEMPLATE,
  [FINAL_SUMMARY_PROMPT_VIDEO]: DEFAULT_VIDEO_FINAL_TEMPLATE,
};

/**
 * Built-in template for `name`. Unknown names get the general final
 * summary template.
 */
export function getDefaultTemplate(name: string): string {
  return DEFAULT_TEMPLATES[name] ?? DEFAULT_FINAL_TEMPLATE;
}

export function hasDefaultTemplate(name: string): boolean {
  return Object.hasOwn(DEFAULT_TEMPLATES, name);
}
