import React from 'react';

// Drawn by the inline script; see src/client/matrixRain.ts.
const MatrixCanvas: React.FC = () => <canvas id="matrix-bg" aria-hidden="true" />;

export default MatrixCanvas;
