/**
 * Bross Sequential Analysis - Progress Feedback Tests
 * ====================================================
 */

import {
  ConsoleProgress,
  createConsoleProgress,
  formatProgress,
  progressInterval,
  silentProgress,
} from '../../src/utils/progress';

const captureStream = () => {
  const chunks: string[] = [];
  return { chunks, write: (chunk: string) => chunks.push(chunk) };
};

describe('progressInterval', () => {
  it('should redraw every iteration for short runs', () => {
    expect(progressInterval(1)).toBe(1);
    expect(progressInterval(200)).toBe(1);
  });

  it('should redraw about a hundred times for long runs', () => {
    expect(progressInterval(201)).toBe(2);
    expect(progressInterval(250)).toBe(3);
    expect(progressInterval(1000)).toBe(10);
  });
});

describe('formatProgress', () => {
  it('should draw a bar with counts and percentage', () => {
    expect(formatProgress(5, 10, 10)).toBe('█████░░░░░ 5 of 10 (50.0%)');
    expect(formatProgress(10, 10, 4)).toBe('████ 10 of 10 (100.0%)');
  });

  it('should handle an empty total', () => {
    expect(formatProgress(0, 0, 4)).toBe('░░░░ 0 of 0 (0.0%)');
  });
});

describe('ConsoleProgress', () => {
  it('should write a label, one redraw per iteration, and a final newline', () => {
    const stream = captureStream();
    const progress = new ConsoleProgress(stream, 'Working');

    progress.start(3);
    progress.update(1, 3);
    progress.update(2, 3);
    progress.update(3, 3);
    progress.finish();

    expect(stream.chunks).toHaveLength(5);
    expect(stream.chunks[0]).toBe('Working\n');
    expect(stream.chunks[3]).toBe(`\r${formatProgress(3, 3)}`);
    expect(stream.chunks[4]).toBe('\n');
  });

  it('should throttle redraws on long runs', () => {
    const stream = captureStream();
    const progress = createConsoleProgress(stream);

    progress.start(1000);
    for (let done = 1; done <= 1000; done++) {
      progress.update(done, 1000);
    }
    progress.finish();

    // label, 100 redraws, newline
    expect(stream.chunks).toHaveLength(102);
    expect(stream.chunks[0]).toBe('Running permutations...\n');
  });

  it('should ignore updates outside a run', () => {
    const stream = captureStream();
    const progress = new ConsoleProgress(stream);

    progress.update(1, 2);
    progress.finish();
    expect(stream.chunks).toEqual([]);
  });
});

describe('silentProgress', () => {
  it('should accept calls and do nothing', () => {
    expect(() => {
      silentProgress.start(10);
      silentProgress.update(1, 10);
      silentProgress.finish();
    }).not.toThrow();
  });
});
