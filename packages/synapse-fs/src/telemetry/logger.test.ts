import { describe, expect, it } from 'vitest';
import { formatHumanLine } from './logger';

const time = Date.UTC(2024, 0, 2, 3, 4, 5);

describe('formatHumanLine', () => {
  it('renders module, level, time and payload', () => {
    const line = formatHumanLine(
      { level: 30, time, module: 'Uploader', msg: 'Uploading file', fileName: 'a.txt', traceId: 'abc' },
      false
    );

    expect(line).toBe(
      ['[Uploader] [INFO] 2024-01-02 03:04:05 Uploading file', '  {', '    "fileName": "a.txt"', '  }'].join('\n')
    );
  });

  it('prints error stacks below the payload', () => {
    const line = formatHumanLine(
      { level: 50, time, msg: 'Upload failed', err: { type: 'Error', message: 'boom', stack: 'Error: boom\n    at run' } },
      false
    );

    expect(line.split('\n')).toEqual([
      '[SynapseFs] [ERROR] 2024-01-02 03:04:05 Upload failed',
      '  {',
      '    "err": {',
      '      "type": "Error",',
      '      "message": "boom"',
      '    }',
      '  }',
      '  Error: boom',
      '      at run',
    ]);
  });

  it('truncates long strings', () => {
    const line = formatHumanLine({ level: 20, time, module: 'ReadChannel', msg: 'x', url: 'a'.repeat(600) }, false);

    expect(line).toContain(`"url": "${'a'.repeat(512)}...[Truncated]"`);
  });

  it('colors the header when enabled', () => {
    const line = formatHumanLine({ level: 40, time, module: 'Auth', msg: 'warn' }, true);

    expect(line).toBe('\u001b[34m[Auth]\u001b[0m \u001b[33m[WARN]\u001b[0m \u001b[2m2024-01-02 03:04:05\u001b[0m warn');
  });
});
