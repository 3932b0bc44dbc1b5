import { createDomView, readBootLog } from './domView';
import { printConsoleGreeting } from './greeting';
import { MatrixRain } from './matrixRain';
import { createSequencer, type Sequencer } from './sequencer';

export interface Presentation {
  sequencer: Sequencer;
  rain: MatrixRain | null;
}

const startRain = (doc: Document): MatrixRain | null => {
  const win = doc.defaultView;
  const canvas = doc.getElementById('matrix-bg');
  if (!win || !(canvas instanceof win.HTMLCanvasElement)) return null;
  const ctx = canvas.getContext('2d');
  if (!ctx) return null;

  canvas.width = win.innerWidth;
  canvas.height = win.innerHeight;
  const rain = new MatrixRain(ctx, canvas.width, canvas.height);

  win.addEventListener('resize', () => {
    canvas.width = win.innerWidth;
    canvas.height = win.innerHeight;
    rain.resize(canvas.width, canvas.height);
  });
  // A persisted pagehide goes into the back/forward cache and may come back.
  win.addEventListener('pagehide', (event) => {
    if (!event.persisted) rain.stop();
  });

  rain.start();
  return rain;
};

/** Starts the rain and the boot-then-reveal sequence on a rendered page. */
export const mountPresentation = (doc: Document): Presentation => {
  printConsoleGreeting();
  const rain = startRain(doc);
  const { view, segments } = createDomView(doc);
  const sequencer = createSequencer({ bootLog: readBootLog(doc), segments, view });
  sequencer.start();
  return { sequencer, rain };
};
