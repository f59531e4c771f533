import { GoogleGenAI, type GenerateContentParameters, type GenerateContentResponse } from "@google/genai";
import type { LlmProvider } from "../provider-types.js";

export class GoogleProvider implements LlmProvider {
    public llm: GoogleGenAI;

    constructor(apiKey: string) {
        this.llm = new GoogleGenAI({ apiKey });
    }

    async generateContent(params: GenerateContentParameters): Promise<GenerateContentResponse> {
        return this.llm.models.generateContent(params);
    }
}
