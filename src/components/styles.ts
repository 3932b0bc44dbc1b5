// Without the script nothing fades the story in or clears the overlay.
export const NOSCRIPT_STYLES = '#main-content { opacity: 1 !important; } #boot-sequence { display: none; }';

export const PAGE_STYLES = `
:root {
  --font-stack: 'JetBrains Mono', 'Fira Code', 'SF Mono', Menlo, Monaco, monospace;
  --background: #0a0a0a;
  --text: #c8c8c8;
  --green: #27c93f;
  --blue: #61afef;
  --yellow: #ffbd2e;
  --red: #ff5f56;
  --purple: #c678dd;
  --muted: #5c6370;
}

* { box-sizing: border-box; }

body {
  margin: 0;
  padding: 0;
  background: var(--background);
  color: var(--text);
  font-family: var(--font-stack);
  font-size: 14px;
  line-height: 1.5;
}

a { color: var(--blue); }

.container {
  max-width: 900px;
  margin: 0 auto;
  padding: 20px;
  transition: opacity 0.5s ease;
}

#matrix-bg {
  position: fixed;
  top: 0;
  left: 0;
  width: 100%;
  height: 100%;
  z-index: -1;
  opacity: 0.05;
}

.scanlines {
  position: fixed;
  inset: 0;
  pointer-events: none;
  background: repeating-linear-gradient(0deg, rgba(0, 0, 0, 0.15) 0, rgba(0, 0, 0, 0.15) 1px, transparent 1px, transparent 2px);
  z-index: 1000;
}

.flicker { animation: flicker 0.15s infinite alternate; }
@keyframes flicker {
  from { opacity: 0.99; }
  to { opacity: 1; }
}

#boot-sequence {
  position: fixed;
  inset: 0;
  background: #000;
  z-index: 9999;
  display: flex;
  align-items: center;
  justify-content: center;
  transition: opacity 0.5s ease;
}
#boot-sequence.hidden {
  opacity: 0;
  pointer-events: none;
}
#boot-log {
  font-size: 13px;
  color: var(--green);
  max-width: 700px;
  line-height: 1.6;
}
#boot-log .line {
  min-height: 1.6em;
  opacity: 0;
  animation: boot-line 0.1s forwards;
}
#boot-log .boot-warning { color: var(--yellow); }
#boot-log .boot-prompt { color: var(--purple); }
#boot-log .boot-ok { color: var(--green); font-weight: bold; }
@keyframes boot-line { to { opacity: 1; } }

.terminal-window {
  background: #1a1a1a;
  border: 1px solid #333;
  border-radius: 8px;
  margin: 20px 0;
  overflow: hidden;
}
.terminal-header {
  display: flex;
  align-items: center;
  gap: 8px;
  padding: 8px 15px;
  background: linear-gradient(#3a3a3a, #2a2a2a);
  border-bottom: 1px solid #222;
}
.terminal-dot { width: 12px; height: 12px; border-radius: 50%; }
.terminal-dot.red { background: var(--red); }
.terminal-dot.yellow { background: var(--yellow); }
.terminal-dot.green { background: var(--green); }
.terminal-title { flex: 1; text-align: center; color: #999; font-size: 12px; }
.status-badge { display: inline-block; padding: 2px 8px; border-radius: 3px; font-size: 0.85em; margin-left: 10px; }
.status-running { background: #27c93f33; color: #27c93f; border: 1px solid #27c93f; }
.status-warning { background: #ffbd2e33; color: #ffbd2e; border: 1px solid #ffbd2e; }
.status-critical { background: #ff5f5633; color: #ff5f56; border: 1px solid #ff5f56; animation: critical-pulse 1s infinite; }
@keyframes critical-pulse { 0%, 100% { opacity: 1; } 50% { opacity: 0.5; } }
.terminal-body { padding: 20px; }

h1.story-title { color: var(--blue); text-align: center; letter-spacing: 0.5em; }
.story-chapter { color: var(--yellow); font-weight: bold; font-size: 1.2em; margin-bottom: 12px; }
.prose { color: #abb2bf; }
.prompt { color: var(--green); }
.highlight { color: var(--blue); }
.cmd { color: #e5c07b; }
.cmd.typing::after { content: '_'; animation: blink 1s step-end infinite; }
.output { color: #999; margin: 0 0 0 2ch; }
@keyframes blink { 50% { opacity: 0; } }

.quote {
  font-size: 1.3em;
  text-align: center;
  color: var(--blue);
  padding: 30px;
  font-style: italic;
}
.quote .quiet { font-size: 0.7em; color: var(--muted); }

.dialogue {
  margin: 15px 0;
  padding: 15px;
  background: var(--background);
  border-left: 3px solid var(--blue);
  border-radius: 4px;
}
.dialogue-speaker { color: #e5c07b; font-weight: bold; margin-bottom: 5px; }
.dialogue-text { color: #abb2bf; font-style: italic; }
.dialogue.rogue { border-color: var(--red); }
.dialogue.rogue .dialogue-speaker { color: var(--red); }

.alert { padding: 15px 20px; border-left: 4px solid; border-radius: 4px; margin: 15px 0; }
.alert-warning { background: #2a201088; border-color: var(--yellow); color: var(--yellow); }
.alert-danger { background: #2a151588; border-color: var(--red); color: var(--red); }

.log-line .time { color: var(--muted); }

.pool-grid {
  display: grid;
  grid-template-columns: repeat(auto-fill, minmax(18px, 1fr));
  gap: 2px;
  margin: 15px 0;
}
.node {
  height: 18px;
  font-size: 10px;
  line-height: 18px;
  text-align: center;
  border-radius: 2px;
}
.node.active { background: #1e3a24; color: var(--green); }
.node.rogue { background: var(--red); color: #000; animation: blink 1s step-end infinite; }
.node.unknown { background: var(--blue); color: #000; }

.redacted {
  background: #333;
  color: #333;
  padding: 0 4px;
  border-radius: 2px;
  cursor: pointer;
  transition: all 0.3s;
}
.redacted:hover { background: transparent; color: var(--red); }

footer { text-align: center; margin: 30px 0; color: var(--muted); }

.segment-pending { display: none; }
`;
