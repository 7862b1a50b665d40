import test from 'node:test';
import assert from 'node:assert/strict';
import { renderTable } from '../src/util/table';
import { validateConfig } from '../src/config';
import type { Logger } from '../src/types';

function recordingLogger() {
  const calls: Array<{ level: string; args: unknown[] }> = [];
  const logger: Logger = {
    debug: (...args: unknown[]) => calls.push({ level: 'debug', args }),
    info: (...args: unknown[]) => calls.push({ level: 'info', args }),
    warn: (...args: unknown[]) => calls.push({ level: 'warn', args }),
    error: (...args: unknown[]) => calls.push({ level: 'error', args })
  };
  return { logger, calls };
}

test('renderTable logs a single prefixed message string at debug', () => {
  const { logger, calls } = recordingLogger();
  renderTable([{ id: 1 }, { id: 2 }], ['id'], { logger });
  assert.deepEqual(calls, [{ level: 'debug', args: ['fixed-width-table: rendered 2 rows x 1 columns'] }]);
});

test('validateConfig warns with one prefixed message string', () => {
  const { logger, calls } = recordingLogger();
  validateConfig({ missingField: { policy: 'sometimes', placeholder: '' }, lineBreak: '\n' }, logger);
  assert.equal(calls.length, 1);
  assert.equal(calls[0].level, 'warn');
  assert.deepEqual(calls[0].args, [
    'fixed-width-table: config validation errors: ["/missingField/policy must be equal to one of the allowed values"]'
  ]);
});

test('a valid config logs nothing', () => {
  const { logger, calls } = recordingLogger();
  validateConfig({ missingField: { policy: 'fail', placeholder: '' }, lineBreak: '\r\n' }, logger);
  assert.deepEqual(calls, []);
});
