import { listCharacterProfiles } from "../../shared/prompts/characters.js";
import { ETHICS_NOTICE, escapeHtml, renderLayout } from "./html.js";

export const renderHomePage = (): string => {
  const options = listCharacterProfiles()
    .map((profile) => `        <a class="option" href="/${profile.type}">
          <span class="emoji">${profile.emoji}</span>
          <strong>${escapeHtml(profile.heading)}</strong>
          <p class="muted">${escapeHtml(profile.tagline)}</p>
        </a>`)
    .join("\n");

  return renderLayout("AI Photo Generator", `      <h1>AI Photo Generator</h1>
      <div class="muted">Who would you like to be photographed with?</div>
      <div class="options">
${options}
      </div>
      <div class="note"><b>Please note:</b> ${escapeHtml(ETHICS_NOTICE)}</div>`);
};
