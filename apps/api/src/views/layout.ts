import { html, raw } from 'hono/html';

type Markup = ReturnType<typeof html>;

const STYLES = `
  body { font-family: system-ui, sans-serif; margin: 0; display: flex; color: #222; }
  .sidebar { width: 280px; padding: 1.5rem; background: #f4f5f7; min-height: 100vh; }
  .sidebar label { display: block; margin-bottom: 0.75rem; }
  .sidebar input, .sidebar select { display: block; width: 100%; margin-top: 0.25rem; }
  main { flex: 1; padding: 1.5rem 2rem; }
  .range label { margin-right: 1rem; }
  .notice.success { color: #1b5e20; }
  .notice.error { color: #b71c1c; }
  table.transactions { border-collapse: collapse; margin: 1rem 0; }
  table.transactions th, table.transactions td { border: 1px solid #ddd; padding: 0.25rem 0.75rem; }
  td.amount { text-align: right; }
  .metrics { display: flex; gap: 2rem; }
  .metric { display: flex; flex-direction: column; }
  .metric-value { font-size: 1.75rem; }
  svg.chart { max-width: 800px; width: 100%; font-size: 12px; }
  .chart-title { font-size: 16px; }
`;

export function renderLayout(title: string, body: Markup): Markup {
  return html`<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>${title}</title>
  <style>${raw(STYLES)}</style>
</head>
<body>
${body}
</body>
</html>`;
}
