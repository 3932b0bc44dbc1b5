import React from 'react';
import { BOOT_DATA_ID, type BootLine } from '../utils/boot';
import type { Story } from '../utils/story';
import type { PoolNodeState } from '../utils/warmPool';
import BootOverlay from './BootOverlay';
import MatrixCanvas from './MatrixCanvas';
import StoryBlock from './StoryBlock';
import TerminalWindow from './TerminalWindow';
import { NOSCRIPT_STYLES, PAGE_STYLES } from './styles';

export interface PageProps {
  story: Story;
  bootLog: readonly BootLine[];
  pool: readonly PoolNodeState[];
  hostname: string;
  cpuCount: number;
  clientScript: string;
}

// Inline <script> bodies end at the first "</"; JSON and bundled code must not contain one.
export const serializeJson = (value: unknown): string =>
  JSON.stringify(value).replace(/</g, '\\u003c');

export const escapeInlineScript = (code: string): string => code.replace(/<\//g, '<\\/');

const Page: React.FC<PageProps> = ({ story, bootLog, pool, hostname, cpuCount, clientScript }) => (
  <html lang="en">
    <head>
      <meta charSet="utf-8" />
      <meta name="viewport" content="width=device-width, initial-scale=1.0" />
      <title>{`${hostname} | ${story.title}`}</title>
      <style dangerouslySetInnerHTML={{ __html: PAGE_STYLES }} />
      <noscript>
        <style dangerouslySetInnerHTML={{ __html: NOSCRIPT_STYLES }} />
      </noscript>
    </head>
    <body className="flicker">
      <MatrixCanvas />
      <div className="scanlines"></div>
      <BootOverlay />

      <main className="container" id="main-content" style={{ opacity: 0 }}>
        <TerminalWindow title="/dev/null">
          <h1 className="story-title" data-segment="line">{story.title}</h1>
          <p className="quote" data-segment="line">
            {story.epigraph.map((text, index) => (
              <React.Fragment key={index}>
                {index > 0 && <br />}
                {text}
              </React.Fragment>
            ))}
          </p>
        </TerminalWindow>

        {story.chapters.map((chapter) => (
          <TerminalWindow key={chapter.id} title={chapter.window} status={chapter.status}>
            <div className="story" id={chapter.id}>
              <div className="story-chapter" data-segment="line">{chapter.heading}</div>
              {chapter.blocks.map((block, index) => (
                <StoryBlock key={index} block={block} pool={pool} />
              ))}
            </div>
          </TerminalWindow>
        ))}

        <div className="quote" data-segment="line">
          {story.coda.map((text, index) => (
            <React.Fragment key={index}>
              {index > 0 && <br />}
              {index === story.coda.length - 1 && index > 0 ? (
                <span className="quiet">{text}</span>
              ) : (
                text
              )}
            </React.Fragment>
          ))}
        </div>

        <footer data-segment="line">
          <p>
            <a href="/info">/info</a> &middot; <a href="/health">/health</a>
          </p>
          <p>{`This page is being served by ${hostname}, a machine with ${cpuCount} CPU cores.`}</p>
          {story.redacted && (
            <p>
              <span className="redacted">{story.redacted}</span>
            </p>
          )}
        </footer>
      </main>

      <script
        type="application/json"
        id={BOOT_DATA_ID}
        dangerouslySetInnerHTML={{ __html: serializeJson(bootLog) }}
      />
      <script dangerouslySetInnerHTML={{ __html: escapeInlineScript(clientScript) }} />
    </body>
  </html>
);

export default Page;
