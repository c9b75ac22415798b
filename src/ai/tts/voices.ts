/** Voices the OpenAI speech endpoint offers. */
export const OPENAI_VOICES = [
    'alloy',
    'ash',
    'ballad',
    'coral',
    'echo',
    'fable',
    'onyx',
    'nova',
    'sage',
    'shimmer',
    'verse',
] as const;

export type OpenAIVoice = (typeof OPENAI_VOICES)[number];

export function isOpenAIVoice(voice: string): voice is OpenAIVoice {
    return OPENAI_VOICES.some((name) => name === voice);
}
