// Tests for the file logger

import { after, test } from 'node:test';
import assert from 'node:assert/strict';
import { spawnSync } from 'node:child_process';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { indexBy } from '../src/attributes.ts';
import { Document } from '../src/document.ts';
import { createLogger, getGlobalLogger, getLogger, Logger, setGlobalLogger } from '../src/logging.ts';

const testLogDir = mkdtempSync(join(tmpdir(), 'quire-logs-'));

after(() => {
  rmSync(testLogDir, { recursive: true, force: true });
});

function readLines(path: string): string[] {
  return readFileSync(path, 'utf8').split('\n').filter(line => line !== '');
}

test('text format writes level, source, context and error', () => {
  const logFile = join(testLogDir, 'text', 'quire.log');
  const logger = createLogger({
    logFile,
    level: 'DEBUG',
    format: 'text',
    includeTimestamp: false,
    flushInterval: 0,
  });

  logger.debug('Parsed chunk', { tokens: 3 }, 'Markup');
  logger.trace('Not written');
  logger.error('Render failed', new Error('boom'));
  logger.flush();

  const lines = readLines(logFile);
  assert.equal(lines.length, 3);
  assert.ok(lines[0].startsWith('INFO  [Logger] Logging session started'));
  assert.equal(lines[1], 'DEBUG [Markup] Parsed chunk | {"tokens":3}');
  assert.equal(lines[2], 'ERROR Render failed | ERROR: boom');

  const stats = logger.getStats();
  assert.equal(stats.totalEntries, 3);
  assert.equal(stats.entriesByLevel.TRACE, 0);
  assert.equal(stats.entriesByLevel.DEBUG, 1);
  assert.equal(stats.bufferSize, 0);

  logger.close();
  assert.equal(logger.logFile, undefined);
  assert.ok(readLines(logFile)[3].includes('Logging session ended'));
});

test('a full buffer is flushed without an explicit flush', () => {
  const logFile = join(testLogDir, 'buffered.log');
  const logger = createLogger({
    logFile,
    format: 'text',
    includeTimestamp: false,
    bufferSize: 2,
    flushInterval: 0,
  });

  logger.info('one');
  assert.equal(readLines(logFile)[1], 'INFO  one');
  logger.close();
});

test('json format produces one object per line', () => {
  const logFile = join(testLogDir, 'json.log');
  const logger = createLogger({ logFile, format: 'json', flushInterval: 0 });

  logger.warn('Ignoring value', { key: 'render.indent' }, 'Config');
  logger.flush();

  const entry: unknown = JSON.parse(readLines(logFile)[1]);
  assert.deepEqual(
    entry !== null && typeof entry === 'object' ? { ...entry, timestamp: 'x', sessionId: 'x' } : entry,
    {
      timestamp: 'x',
      level: 'WARN',
      message: 'Ignoring value',
      context: { key: 'render.indent' },
      source: 'Config',
      sessionId: 'x',
    }
  );
  logger.close();
});

test('structured format', () => {
  const logger = new Logger({ format: 'structured' });
  const line = logger.formatEntry({
    timestamp: new Date(0),
    level: 'INFO',
    message: 'loaded',
    context: { path: 'x', count: 2 },
    source: 'Config',
  });
  assert.equal(line, '1970-01-01T00:00:00.000Z [INFO] Config: loaded | path="x", count=2\n');
});

test('an empty log file disables the logger', () => {
  const logger = createLogger({ logFile: '' });
  logger.error('dropped');
  assert.equal(logger.disabled, true);
  assert.equal(logger.getStats().totalEntries, 0);
  assert.equal(logger.logFile, undefined);
});

test('level filtering follows setLevel', () => {
  const logger = new Logger({ logFile: '', level: 'WARN' });
  assert.equal(logger.level, 'WARN');
  logger.setLevel('TRACE');
  assert.equal(logger.level, 'TRACE');
});

test('component loggers follow the global logger', () => {
  const logFile = join(testLogDir, 'global.log');
  const component = getLogger('Document');
  const logger = createLogger({ logFile, format: 'text', includeTimestamp: false, flushInterval: 0 });

  setGlobalLogger(logger);
  assert.equal(getGlobalLogger(), logger);
  component.info('Destroyed subtree', { elements: 2 });
  component.flush();

  assert.equal(readLines(logFile)[1], 'INFO  [Document] Destroyed subtree | {"elements":2}');

  setGlobalLogger(createLogger({ logFile: '' }));
  assert.equal(logger.disabled, true);
});

/** A path whose parent directory cannot be created: it sits below a regular file */
function unwritablePath(name: string): string {
  const blocker = join(testLogDir, `${name}-blocker`);
  writeFileSync(blocker, '');
  return join(blocker, 'sub', `${name}.log`);
}

test('an unwritable log path disables the logger', (t) => {
  const reported = t.mock.method(console, 'error', () => {});
  const logger = createLogger({ logFile: unwritablePath('mkdir'), level: 'DEBUG', flushInterval: 0 });

  logger.info('dropped');
  logger.flush();

  assert.equal(logger.disabled, true);
  assert.equal(logger.logFile, undefined);
  assert.equal(logger.getStats().totalEntries, 0);
  assert.equal(reported.mock.callCount(), 1);
});

test('a failed write disables the logger and drops the buffer', (t) => {
  const reported = t.mock.method(console, 'error', () => {});
  const directory = join(testLogDir, 'is-a-directory');
  mkdirSync(directory);
  const logger = createLogger({ logFile: directory, flushInterval: 0 });

  logger.info('buffered');
  logger.flush();
  logger.info('after failure');
  logger.close();

  assert.equal(logger.disabled, true);
  assert.equal(logger.getStats().bufferSize, 0);
  assert.equal(reported.mock.callCount(), 1);
});

test('engine calls keep working when the log file cannot be written', (t) => {
  t.mock.method(console, 'error', () => {});
  setGlobalLogger(createLogger({ logFile: unwritablePath('engine'), level: 'DEBUG' }));

  const doc = new Document();
  doc.ingestMarkup(doc.root, '<foo>hi</foo>');
  assert.deepEqual(doc.getDiagnostics(doc.root).map(d => d.code), ['unknown-tag', 'unknown-tag']);
  assert.deepEqual(doc.root.content.text, ['hi']);

  const a = doc.createElement('div', [indexBy('a')]);
  const b = doc.createElement('div', [indexBy('b')]);
  b.setAttribute(indexBy('a'));
  assert.equal(doc.getElementById('a'), b);
  assert.equal(b.id, 'a');
  assert.equal(a.id, 'a');
  assert.equal(doc.hasElement('b'), false);

  setGlobalLogger(createLogger({ logFile: '' }));
});

test('buffered entries are written when the process exits', () => {
  const logFile = join(testLogDir, 'exit', 'child.log');
  const script = join(testLogDir, 'exit-logger.mts');
  const loggingModule = new URL('../src/logging.ts', import.meta.url).href;
  writeFileSync(script, [
    `import { createLogger } from '${loggingModule}';`,
    `const logger = createLogger({ logFile: process.argv[2], level: 'INFO', format: 'text', includeTimestamp: false });`,
    `logger.info('first entry', undefined, 'Child');`,
    `logger.warn('second entry', { count: 2 }, 'Child');`,
    '',
  ].join('\n'));

  const result = spawnSync(process.execPath, ['--import', 'tsx', script, logFile], {
    cwd: fileURLToPath(new URL('..', import.meta.url)),
    encoding: 'utf8',
  });
  assert.equal(result.status, 0, result.stderr);

  const lines = readLines(logFile);
  assert.equal(lines.length, 3);
  assert.ok(lines[0].startsWith('INFO  [Logger] Logging session started'));
  assert.equal(lines[1], 'INFO  [Child] first entry');
  assert.equal(lines[2], 'WARN  [Child] second entry | {"count":2}');
});
