import React from 'react';
import type { StoryBlock as StoryBlockData } from '../utils/story';
import type { PoolNodeState } from '../utils/warmPool';
import WarmPoolGrid from './WarmPoolGrid';

interface StoryBlockProps {
  block: StoryBlockData;
  pool: readonly PoolNodeState[];
}

// Everything tagged data-segment is hidden up front and revealed in document
// order by the inline script; "type" segments are typed out character by character.
const StoryBlock: React.FC<StoryBlockProps> = ({ block, pool }) => {
  switch (block.kind) {
    case 'prose':
      return <p className="prose" data-segment="line">{block.text}</p>;
    case 'command':
      return (
        <div className="command">
          <p data-segment="line">
            <span className="prompt">{block.prompt}</span>:<span className="highlight">~</span>${' '}
            <span className="cmd" data-segment="type">{block.command}</span>
          </p>
          {block.output.map((line, index) => (
            <p key={index} className="output" data-segment="line">{line}</p>
          ))}
        </div>
      );
    case 'dialogue':
      return (
        <div className={block.rogue ? 'dialogue rogue' : 'dialogue'} data-segment="line">
          <div className="dialogue-speaker">{`${block.speaker}:`}</div>
          <div className="dialogue-text">{block.text}</div>
        </div>
      );
    case 'alert':
      return <div className={`alert alert-${block.level}`} data-segment="line">{block.text}</div>;
    case 'quote':
      return (
        <p className="quote" data-segment="line">
          {block.lines.map((text, index) => (
            <React.Fragment key={index}>
              {index > 0 && <br />}
              {text}
            </React.Fragment>
          ))}
        </p>
      );
    case 'log':
      return (
        <div className="log">
          {block.lines.map((entry, index) => (
            <p key={index} className="log-line" data-segment="line">
              <span className="time">{`[${entry.time}]`}</span> {entry.text}
            </p>
          ))}
        </div>
      );
    case 'pool':
      return <WarmPoolGrid nodes={pool} />;
  }
};

export default StoryBlock;
