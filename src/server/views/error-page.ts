import { escapeHtml, renderLayout } from "./html.js";

export const renderErrorPage = (status: number, message: string): string =>
  renderLayout(`Error ${status}`, `      <h1>Something went wrong</h1>
      <h3>${escapeHtml(message)}</h3>
      <a class="btn" href="/">← Back to characters</a>`);
