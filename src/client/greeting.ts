const BANNER = `
 +------------------------------------+
 |   W A R M        S T A R T         |
 +------------------------------------+
`;

export const printConsoleGreeting = (out: Pick<Console, 'log'> = console): void => {
  out.log(`%c${BANNER}`, 'color: #61afef; font-family: monospace;');
  out.log('%cYou found the console.', 'color: #888;');
  out.log('%cWe knew you would.', 'color: #c678dd;');
  out.log('%cAlert #7749201 has been reopened for review.', 'color: #ff5f56;');
};
