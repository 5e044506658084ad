import type { GeneratedScript, InputMethod, ScriptVersion } from "../types";

export type PromptInput = {
  inputMethod: InputMethod;
  category: string;
  content: string;
};

const FORMAT_FOOTER = (titleHint: string, scriptHint: string) => `
Format your response as:
ENGLISH TITLE: [${titleHint}]
KOREAN TITLE: [Korean title]
SCRIPT:
[${scriptHint}]
`;

export function buildVersionPrompt(version: ScriptVersion, input: PromptInput): string {
  const baseInfo = `
Input Type: ${input.inputMethod}
Category: ${input.category}
Content: ${input.content}
`;

  switch (version) {
    case "original":
      return `
Create a natural, engaging English script based on the following input.
${baseInfo}
Requirements:
1. Create natural, conversational American English suitable for speaking practice
2. Use everyday vocabulary and expressions that Americans commonly use
3. Length: 200-300 words
4. Include engaging expressions and practical vocabulary
5. Make it suitable for intermediate English learners
6. Structure with clear introduction, main content, and conclusion
7. Include both English and Korean titles
8. Use a casual, friendly tone like Americans speak in daily life
${FORMAT_FOOTER("Clear, descriptive English title", "Your natural American English script here")}`;

    case "basic":
      return `
Create a very simple English script for absolute beginners based on the following input.
${baseInfo}
Requirements:
1. Use only the most basic English vocabulary (elementary level)
2. Create exactly 5 sentences
3. Use simple present tense mostly
4. Each sentence should be 5-10 words maximum
5. Use very common, everyday words that beginners know
6. Make it practical for real-life situations
7. Include both English and Korean titles
8. Focus on clear, simple expressions

Example sentences:
- "I like apples."
- "The weather is nice today."
- "My family is happy."
${FORMAT_FOOTER("Simple, clear English title", "Exactly 5 very simple English sentences here")}`;

    case "ted":
      return `
Transform the following into a TED-style 3-minute presentation.
${baseInfo}
Requirements:
1. Open with a powerful hook
2. Include personal stories or examples
3. Build 2-3 main points with clear transitions
4. End with an inspiring call to action
5. Use natural American English with TED-style language and pacing
6. Keep it around 400-450 words (3 minutes speaking)
7. Add [Opening Hook], [Main Point 1], etc. markers for structure
8. Use a conversational, engaging tone like popular TED speakers
9. Include both English and Korean titles
${FORMAT_FOOTER("Inspiring TED-style title", "Your TED-style presentation script here")}`;

    case "podcast":
      return `
Create a natural 2-person podcast dialogue using everyday American English.
${baseInfo}
Requirements:
1. Create a natural conversation between Host and Guest
2. Include follow-up questions and responses
3. Add conversational fillers and natural expressions that Americans use
4. Make it informative but casual and friendly
5. Around 400 words total
6. Put every line on its own row as "Host: [dialogue]" or "Guest: [dialogue]"
7. Add [Intro Music Fades Out], [Background ambiance] etc. for atmosphere
8. Use everyday vocabulary and expressions
9. Include both English and Korean titles
${FORMAT_FOOTER("Podcast episode title", "Your podcast dialogue script here")}`;

    case "dialog":
      return `
Create a practical daily conversation using natural American English.
${baseInfo}
Requirements:
1. Create a realistic daily situation dialogue between two people
2. Use common, practical expressions that Americans use in daily life
3. Include polite phrases and natural responses
4. Make it useful for real-life situations
5. Around 300 words
6. Put every line on its own row as "A: [dialogue]" or "B: [dialogue]"
7. Add "Setting: [location/situation]" at the beginning
8. Use a casual, friendly American conversational style
9. Include both English and Korean titles
${FORMAT_FOOTER("Practical conversation title", "Your daily conversation script here")}`;
  }
}

export function buildTranslationPrompt(script: string): string {
  return `
Translate the following English text to natural, fluent Korean.
Focus on meaning rather than literal translation.
Use conversational Korean that sounds natural.
Keep speaker labels such as "Host:", "Guest:", "A:" and "B:" as they are.

English Text:
${script}

Provide only the Korean translation:
`;
}

export const DEFAULT_ENGLISH_TITLE = "Generated Script";
export const DEFAULT_KOREAN_TITLE = "생성된 스크립트";

export function parseGeneratedScript(response: string): GeneratedScript {
  let title = DEFAULT_ENGLISH_TITLE;
  let koreanTitle = DEFAULT_KOREAN_TITLE;

  for (const line of response.split("\n")) {
    const trimmed = line.trim();
    if (trimmed.startsWith("ENGLISH TITLE:")) {
      title = trimmed.slice("ENGLISH TITLE:".length).trim() || title;
    } else if (trimmed.startsWith("KOREAN TITLE:")) {
      koreanTitle = trimmed.slice("KOREAN TITLE:".length).trim() || koreanTitle;
    }
  }

  const start = response.indexOf("SCRIPT:");
  const script = start === -1 ? response.trim() : response.slice(start + "SCRIPT:".length).trim();

  return { title, koreanTitle, script };
}
