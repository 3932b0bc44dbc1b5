import React from 'react';
import type { ChapterStatus } from '../utils/story';

interface TerminalWindowProps {
  title: string;
  status?: ChapterStatus;
  children: React.ReactNode;
}

const TerminalWindow: React.FC<TerminalWindowProps> = ({ title, status, children }) => (
  <section className="terminal-window" data-segment="line">
    <div className="terminal-header">
      <span className="terminal-dot red"></span>
      <span className="terminal-dot yellow"></span>
      <span className="terminal-dot green"></span>
      <span className="terminal-title">
        {title}
        {status && <span className={`status-badge status-${status.level}`}>{status.label}</span>}
      </span>
    </div>
    <div className="terminal-body">{children}</div>
  </section>
);

export default TerminalWindow;
