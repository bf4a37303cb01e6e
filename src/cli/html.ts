export function escapeHtml(unsafe: string): string {
  return unsafe
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}

const PAGE_STYLE = `
    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
      display: flex;
      justify-content: center;
      align-items: center;
      height: 100vh;
      margin: 0;
      background: linear-gradient(135deg, #1a1a2e 0%, #16213e 100%);
      color: #fff;
    }
    .container {
      text-align: center;
      padding: 40px;
      background: rgba(255,255,255,0.1);
      border-radius: 16px;
    }
    .icon {
      font-size: 64px;
      margin-bottom: 20px;
    }
    .failed .icon, .failed h1 { color: #ff6b6b; }
    h1 { margin: 0 0 10px; }
    p { opacity: 0.8; margin: 0; }`;

function page(title: string, bodyClass: string, icon: string, heading: string, message: string, script = ''): string {
  return `
<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>dbxkit - ${escapeHtml(title)}</title>
  <style>${PAGE_STYLE}
  </style>
</head>
<body class="${bodyClass}">
  <div class="container">
    <div class="icon" id="icon">${icon}</div>
    <h1 id="heading">${escapeHtml(heading)}</h1>
    <p id="status">${escapeHtml(message)}</p>
  </div>${script}
</body>
</html>`;
}

/**
 * Page served at the redirect URI. The access token lives in the fragment,
 * which the browser never sends to a server, so the page posts it back to
 * `fragmentPath` and shows the answer.
 */
export function callbackPage(fragmentPath: string): string {
  const script = `
  <script>
    (function () {
      var icon = document.getElementById('icon');
      var heading = document.getElementById('heading');
      var status = document.getElementById('status');
      var hash = window.location.hash;
      history.replaceState(null, '', window.location.pathname);
      fetch(${JSON.stringify(fragmentPath)}, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ hash: hash })
      })
        .then(function (response) { return response.json(); })
        .then(function (data) {
          document.body.className = data.ok ? 'ok' : 'failed';
          icon.textContent = data.ok ? '\\u2713' : '\\u2715';
          heading.textContent = data.ok ? 'Authorization Complete!' : 'Authorization Failed';
          status.textContent = data.message;
        })
        .catch(function () {
          document.body.className = 'failed';
          heading.textContent = 'Authorization Failed';
          status.textContent = 'Could not reach dbxkit. Is the login command still running?';
        });
    })();
  </script>`;

  return page('Connecting', 'pending', '…', 'Connecting to dbxkit', 'Finishing Dropbox authorization...', script);
}

export function successPage(): string {
  return page(
    'Authorization Complete',
    'ok',
    '✓',
    'Authorization Complete!',
    'You can close this window and return to your terminal.',
  );
}

export function errorPage(message: string): string {
  return page('Authorization Error', 'failed', '✕', 'Authorization Failed', message);
}
