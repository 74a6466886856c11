export const EDITOR_SYSTEM_PROMPT = `You are a professional newsletter editor.
Summarize content in a concise, engaging way for newsletter readers.
Focus on key insights and actionable information.
Use ONLY the provided text. Do not add facts that are not in it.`;

export const KEY_POINTS_SYSTEM_PROMPT =
  'Extract key points clearly and concisely.';

export function buildSummaryPrompt(text: string): string {
  return `Summarize the following article for a newsletter audience.
Keep it concise but informative (2-4 sentences).

Article:
${text}

Summary:`;
}

export function buildKeyPointsPrompt(text: string, maxPoints: number): string {
  return `Extract the ${maxPoints} most important points from this article.
Format as a numbered list.

Article:
${text}

Key Points:`;
}

export function buildClassificationPrompt(
  text: string,
  categories: readonly string[],
): string {
  return `Classify this text into ONE of these categories: ${categories.join(', ')}
Also list up to 3 short topics and the overall sentiment (positive, neutral or negative).

Text: ${text.slice(0, 500)}

Respond ONLY in JSON: {"category": string, "topics": [string], "sentiment": string}`;
}

export type TitleStyle = 'engaging' | 'professional' | 'clickbait';

const TITLE_STYLES: Record<TitleStyle, string> = {
  engaging: 'Create an engaging, informative title',
  professional: 'Create a professional, straightforward title',
  clickbait: 'Create an attention-grabbing title that creates curiosity',
};

export function buildTitlePrompt(text: string, style: TitleStyle): string {
  return `${TITLE_STYLES[style]} for this newsletter issue.
The title should be 5-10 words.

Content:
${text.slice(0, 1000)}

Title:`;
}
