import React from 'react';

/** Full-screen overlay the boot log is written into before the story shows. */
const BootOverlay: React.FC = () => (
  <div id="boot-sequence">
    <div id="boot-log" role="log" aria-live="polite"></div>
  </div>
);

export default BootOverlay;
