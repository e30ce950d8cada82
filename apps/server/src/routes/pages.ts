/**
 * HTML pages shown in the browser at the end of the authorization round trip.
 */

const STYLE = `
      body {
        font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif;
        display: flex;
        justify-content: center;
        align-items: center;
        min-height: 100vh;
        margin: 0;
        background-color: #f5f5f5;
      }
      .container {
        text-align: center;
        background: white;
        padding: 40px;
        border-radius: 8px;
        box-shadow: 0 2px 10px rgba(0,0,0,0.1);
        max-width: 420px;
      }
      .title {
        font-size: 24px;
        font-weight: bold;
        margin-bottom: 20px;
        color: #333;
      }
      .success { color: #28a745; margin: 20px 0; }
      .error { color: #dc3545; margin: 20px 0; }
      .success h2, .error h2 { margin: 0 0 10px 0; }
      .success p, .error p { margin: 0; color: #666; word-break: break-word; }
      code { background: #f0f0f0; padding: 2px 4px; border-radius: 3px; }`;

function page(title: string, body: string): string {
  return `<!DOCTYPE html>
<html>
  <head>
    <title>fitsync - ${escapeHtml(title)}</title>
    <style>${STYLE}
    </style>
  </head>
  <body>
    <div class="container">
      <div class="title">fitsync</div>
${body}
    </div>
  </body>
</html>`;
}

export function renderSuccessPage(connection: {
  accountKey: string;
  subjectId: string;
}): string {
  return page(
    "Connected",
    `      <div class="success">
        <h2>Fitbit connected</h2>
        <p>Account <strong>${escapeHtml(connection.accountKey)}</strong> is linked to Fitbit user <code>${escapeHtml(connection.subjectId)}</code>.</p>
      </div>
      <p>You can close this window. Trigger a sync with <code>POST /sync</code> or <code>fitsync sync</code>.</p>`
  );
}

export function renderErrorPage(errorMessage: string): string {
  return page(
    "Connection Failed",
    `      <div class="error">
        <h2>Connection failed</h2>
        <p>${escapeHtml(errorMessage)}</p>
      </div>
      <p>Please close this window and start the connection again.</p>`
  );
}

/**
 * Escape HTML special characters to prevent XSS.
 */
export function escapeHtml(unsafe: string): string {
  return unsafe
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}
