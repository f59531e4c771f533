const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export const escapeHtml = (value: string | number): string =>
  String(value).replace(/[&<>"']/g, (char) => HTML_ESCAPES[ char ] ?? char);

const BASE_STYLES = `
      body{font-family:system-ui,-apple-system,Segoe UI,Roboto,sans-serif;margin:32px;color:#111;background:#f8fafc}
      .card{max-width:900px;margin:0 auto;background:white;border-radius:16px;box-shadow:0 4px 6px -1px rgba(0,0,0,0.1);padding:32px}
      h1{margin:0 0 8px 0}
      .muted{color:#666}
      .grid{display:grid;grid-template-columns:repeat(2,1fr);gap:12px;margin-top:18px}
      .imgbox{border:1px solid #e5e5e5;border-radius:12px;overflow:hidden}
      .imgbox img{width:100%;display:block}
      .note{background:#f8fafc;border:1px solid #e5e7eb;border-radius:10px;padding:12px;margin-top:16px}
      .note.error{color:#b42318;border-color:#fecaca;background:#fff1f2}
      .btn{background:#111;color:#fff;border:none;border-radius:10px;padding:10px 16px;cursor:pointer;text-decoration:none;display:inline-block}
      .btn.secondary{background:#666}
      .row{display:flex;gap:12px;align-items:center;margin:10px 0}
      .options{display:grid;grid-template-columns:1fr 1fr;gap:24px;margin:24px 0}
      .option{border:2px solid #e5e5e5;border-radius:12px;padding:24px;text-align:center;color:inherit;text-decoration:none}
      .option:hover{border-color:#111}
      .emoji{font-size:48px;display:block;margin-bottom:12px}
      footer{margin-top:24px;color:#666;font-size:13px}`;

export const ETHICS_NOTICE =
  "This service creates AI-composited images. Do not use them to impersonate anyone or to spread misinformation. " +
  "Uploaded photos are deleted as soon as processing finishes.";

/**
 * Wraps page content in the shared document shell. `title` is escaped here;
 * `body` must already be safe HTML.
 */
export const renderLayout = (title: string, body: string): string => `<!doctype html>
<html>
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${escapeHtml(title)}</title>
    <style>${BASE_STYLES}
    </style>
  </head>
  <body>
    <div class="card">
${body}
    </div>
  </body>
</html>
`;
