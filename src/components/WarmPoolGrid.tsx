import React from 'react';
import type { PoolNodeState } from '../utils/warmPool';

const GLYPHS: Record<PoolNodeState, string> = {
  active: 'C',
  rogue: '!',
  unknown: '?',
};

interface WarmPoolGridProps {
  nodes: readonly PoolNodeState[];
}

const WarmPoolGrid: React.FC<WarmPoolGridProps> = ({ nodes }) => {
  const rogue = nodes.filter((state) => state === 'rogue').length;
  return (
    <div data-segment="line">
      <div className="pool-grid">
        {nodes.map((state, index) => (
          <div key={index} className={`node ${state}`}>
            {GLYPHS[state]}
          </div>
        ))}
      </div>
      <p className="output">{`${nodes.length} instances warm, ${rogue} not responding to health checks`}</p>
    </div>
  );
};

export default WarmPoolGrid;
