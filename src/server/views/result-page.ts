import { getCharacterProfile } from "../../shared/prompts/characters.js";
import type { GenerationOutcome } from "../../shared/services/generation-service.js";
import { escapeHtml, renderLayout } from "./html.js";

export const formatFailure = (label: string, message: string): string => `${label}: failed — ${message}`;

export const renderResultPage = (outcome: GenerationOutcome): string => {
  const profile = getCharacterProfile(outcome.character);

  const thumbs = outcome.imageUrls
    .map((url) => `        <div class="imgbox"><img src="${escapeHtml(url)}" alt="Generated shot"/></div>`)
    .join("\n");

  const failures = outcome.failures.length
    ? `
      <div class="note error"><b>Some shots failed</b><br/>${outcome.failures
        .map((failure) => escapeHtml(formatFailure(failure.label, failure.message)))
        .join("<br/>")}</div>`
    : "";

  return renderLayout(`Results: ${profile.title} (${profile.scenes.length} shots)`, `      <div class="row">
        <a class="btn" href="/">← Characters</a>
        <a class="btn" href="/${profile.type}">← Try again</a>
        <div class="muted">Generated ${outcome.imageUrls.length}</div>
      </div>
      <div class="grid">
${thumbs}
      </div>${failures}
      <p class="muted">All images were generated with Google Gemini.</p>`);
};
