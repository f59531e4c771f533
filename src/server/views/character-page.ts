import { MAX_UPLOAD_FILES } from "../../shared/constants.js";
import { imageModelName } from "../../shared/llm/google/models.js";
import type { CharacterProfile } from "../../shared/prompts/characters.js";
import { ETHICS_NOTICE, escapeHtml, renderLayout } from "./html.js";

export const renderCharacterPage = (profile: CharacterProfile, model: string = imageModelName): string => {
  const exactCharacterOption = profile.hasLookAlike
    ? `
        <div class="row">
          <label><input type="checkbox" name="exact_character" checked>
            Try the real ${escapeHtml(profile.title)} (switches to a look-alike if the request is rejected)</label>
        </div>`
    : "";

  return renderLayout(profile.heading, `      <a href="/" class="btn secondary">← Back to characters</a>
      <h1>${profile.emoji} ${escapeHtml(profile.heading)} (${profile.scenes.length} shots)</h1>
      <div class="muted">${escapeHtml(profile.tagline)}</div>
      <form action="/generate" method="post" enctype="multipart/form-data">
        <input type="hidden" name="character_type" value="${profile.type}">
        <div class="row">
          <label>Selfies (at least 1, up to ${MAX_UPLOAD_FILES}):
            <input type="file" name="selfies" accept="image/*" multiple required>
          </label>
        </div>
        <small class="muted">Photos from several angles keep your likeness more consistent.</small>${exactCharacterOption}
        <div class="note"><b>Ethics</b> · ${escapeHtml(ETHICS_NOTICE)}</div>
        <div class="row"><button class="btn" type="submit">Generate ${profile.scenes.length} photos</button></div>
      </form>
      <footer>Model: Google <b>${escapeHtml(model)}</b></footer>`);
};
