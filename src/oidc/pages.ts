import { escapeHtml } from './utils.js'

const PAGE_STYLE = `
      body { font-family: system-ui, sans-serif; padding: 40px; text-align: center; color: #1f2937; }
      h1.ok { color: #16a34a; }
      h1.fail { color: #dc2626; }
      pre { display: inline-block; text-align: left; white-space: pre-wrap; max-width: 720px; }`

function page(title: string, body: string): string {
  return `<!DOCTYPE html>
<html>
  <head>
    <meta charset="utf-8">
    <title>${escapeHtml(title)}</title>
    <style>${PAGE_STYLE}
    </style>
  </head>
  <body>
${body}
  </body>
</html>
`
}

export const SUCCESS_HTML = page(
  'OIDC Login Successful',
  `    <h1 class="ok">Signed in via your OIDC provider</h1>
    <p>You can close this window and return to the terminal.</p>`,
)

/** Error page; summary and detail are escaped before they are embedded. */
export function errorHtml(summary: string, detail: string): string {
  return page(
    'OIDC Login Failed',
    `    <h1 class="fail">${escapeHtml(summary)}</h1>
    <pre>${escapeHtml(detail)}</pre>
    <p>You can close this window and retry the login from the terminal.</p>`,
  )
}
