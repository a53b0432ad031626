/**
 * Base layout for the CEC Remote web UI.
 *
 * Uses Pico CSS for classless styling and HTMX for declarative AJAX.
 * Live events arrive over SSE, handled in /public/dashboard.js.
 */
import type { FC, PropsWithChildren } from "hono/jsx";

type BaseLayoutProps = PropsWithChildren<{
  title: string;
}>;

export const BaseLayout: FC<BaseLayoutProps> = ({ title, children }) => (
  <html lang="en" data-theme="dark">
    <head>
      <meta charset="utf-8" />
      <meta name="viewport" content="width=device-width, initial-scale=1" />
      <meta name="color-scheme" content="dark" />
      <meta name="theme-color" content="#1a1a2e" />

      <title>{title}</title>

      {/* Pico CSS - Classless styling */}
      <link
        rel="stylesheet"
        href="https://cdn.jsdelivr.net/npm/@picocss/pico@2/css/pico.min.css"
      />
      <link rel="stylesheet" href="/public/styles.css" />

      {/* HTMX - must use closing tag for HTML script */}
      <script src="https://unpkg.com/htmx.org@2">{""}</script>
    </head>
    <body>
      {/* Connection status bar - updated by dashboard.js */}
      <div id="connection-status" class="connection-bar disconnected">
        Connecting...
      </div>

      <main class="container">{children}</main>
    </body>
  </html>
);
