import type { GenerateContentParameters, GenerateContentResponse } from "@google/genai";

export interface LlmProvider {
    generateContent(params: GenerateContentParameters): Promise<GenerateContentResponse>;
}
