import { describe, it, expect, vi } from 'vitest';
import { printConsoleGreeting } from '../../src/client/greeting';

describe('printConsoleGreeting', () => {
  it('logs a styled banner and the follow-up lines', () => {
    const log = vi.fn();
    printConsoleGreeting({ log });

    expect(log).toHaveBeenCalledTimes(4);
    expect(log.mock.calls[0][0]).toContain('W A R M        S T A R T');
    expect(log.mock.calls[1]).toEqual(['%cYou found the console.', 'color: #888;']);
    expect(log.mock.calls[3][0]).toBe('%cAlert #7749201 has been reopened for review.');
  });
});
