import { escapeHtml, escapeHtmlAttr } from "../shared/text.js";
import type { PageState } from "./api.js";

/** How often the page refreshes the output panel (ms) */
const POLL_INTERVAL_MS = 3000;

function renderInstances(state: PageState): string {
  if (state.instances.length === 0) {
    return `<p class="muted">No other instances seen yet.</p>`;
  }
  const items = state.instances
    .map((inst) => {
      const current = inst.pane === state.currentPane;
      return /* html */ `
        <li class="${current ? "current" : ""}">
          <button type="button" data-switch="${escapeHtmlAttr(inst.pane)}" ${current ? "disabled" : ""}>
            <span class="name">${escapeHtml(inst.display_name)}</span>
            <span class="pane">${escapeHtml(inst.pane)}</span>
          </button>
        </li>`;
    })
    .join("");
  return `<ul class="instances">${items}</ul>`;
}

export function getPageHtml(state: PageState): string {
  return /* html */ `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1.0" />
  <title>Remote Pane: ${escapeHtml(state.sessionName)}</title>
  <style>
    :root {
      --bg: #0a0e17;
      --surface: #111827;
      --border: #1e293b;
      --text: #e2e8f0;
      --text-muted: #64748b;
      --accent: #3b82f6;
      --green: #22c55e;
      --red: #ef4444;
      --mono: 'JetBrains Mono', 'Fira Code', 'SF Mono', monospace;
      --sans: 'DM Sans', 'Segoe UI', system-ui, sans-serif;
    }
    * { box-sizing: border-box; margin: 0; padding: 0; }
    body { background: var(--bg); color: var(--text); font-family: var(--sans); padding: 12px; }
    header { display: flex; align-items: center; gap: 8px; margin-bottom: 12px; }
    .dot { width: 10px; height: 10px; border-radius: 50%; background: var(--red); }
    .dot.on { background: var(--green); }
    h1 { font-size: 16px; font-weight: 600; }
    #output {
      background: var(--surface); border: 1px solid var(--border); border-radius: 6px;
      padding: 10px; font-family: var(--mono); font-size: 12px; white-space: pre-wrap;
      word-break: break-word; max-height: 60vh; overflow-y: auto;
    }
    form { display: flex; gap: 8px; margin: 12px 0; }
    textarea {
      flex: 1; background: var(--surface); color: var(--text); border: 1px solid var(--border);
      border-radius: 6px; padding: 8px; font-family: var(--mono); font-size: 14px; min-height: 44px;
    }
    button {
      background: var(--accent); color: white; border: 0; border-radius: 6px;
      padding: 8px 14px; font-size: 14px; cursor: pointer;
    }
    button:disabled { opacity: 0.5; cursor: default; }
    #status { font-size: 12px; color: var(--text-muted); min-height: 16px; }
    .instances { list-style: none; display: flex; flex-direction: column; gap: 6px; margin-top: 8px; }
    .instances button { width: 100%; display: flex; justify-content: space-between; background: var(--surface); border: 1px solid var(--border); }
    .instances .current button { border-color: var(--accent); }
    .pane, .muted { color: var(--text-muted); font-family: var(--mono); font-size: 12px; }
    h2 { font-size: 13px; color: var(--text-muted); margin-top: 16px; }
  </style>
</head>
<body>
  <header>
    <span id="dot" class="dot ${state.active ? "on" : ""}"></span>
    <h1>${escapeHtml(state.sessionName)}</h1>
  </header>
  <pre id="output">${escapeHtml(state.output)}</pre>
  <form id="send">
    <textarea id="text" placeholder="Reply to the assistant..."></textarea>
    <button type="submit">Send</button>
  </form>
  <div id="status"></div>
  <h2>Instances</h2>
  ${renderInstances(state)}
  <script>
    const params = new URLSearchParams(window.location.search);
    const pinned = params.get("pane");
    const out = document.getElementById("output");
    const dot = document.getElementById("dot");
    const statusEl = document.getElementById("status");

    async function refresh() {
      const query = pinned ? "?pane=" + encodeURIComponent(pinned) : "";
      try {
        const res = await fetch("/api/output" + query);
        const data = await res.json();
        const atBottom = out.scrollTop + out.clientHeight >= out.scrollHeight - 20;
        out.textContent = data.output;
        dot.classList.toggle("on", data.active);
        if (atBottom) out.scrollTop = out.scrollHeight;
      } catch (err) {
        statusEl.textContent = "Connection lost, retrying...";
      }
    }

    document.getElementById("send").addEventListener("submit", async (ev) => {
      ev.preventDefault();
      const input = document.getElementById("text");
      const text = input.value.trim();
      if (!text) return;
      const res = await fetch("/api/send", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(pinned ? { text, pane: pinned } : { text }),
      });
      const data = await res.json();
      statusEl.textContent = data.error || data.message;
      if (res.ok) input.value = "";
      setTimeout(refresh, 500);
    });

    document.querySelectorAll("[data-switch]").forEach((btn) => {
      btn.addEventListener("click", async () => {
        const res = await fetch("/api/switch", {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({ pane: btn.dataset.switch }),
        });
        const data = await res.json();
        if (res.ok) window.location.href = "/";
        else statusEl.textContent = data.error;
      });
    });

    out.scrollTop = out.scrollHeight;
    setInterval(refresh, ${POLL_INTERVAL_MS});
  </script>
</body>
</html>`;
}
