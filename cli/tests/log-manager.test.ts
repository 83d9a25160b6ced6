/**
 * Tests for log line formatting and level filtering
 *
 * Run: npx tsx cli/tests/log-manager.test.ts
 */
import fs from 'fs';
import path from 'path';
import os from 'os';
import { clearConfigCache, setConfigOverrides, setConfigPath } from '../managers/config-manager.js';
import { formatLogLine, getLogLevel, isLevelEnabled, logDebug, logInfo, setLogFile, setLogLevel } from '../managers/log-manager.js';
import { test, assert, assertEqual, summary } from './harness.js';

const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'critpath-log-'));
const logFile = path.join(tmpDir, 'critpath.log');

function reset(): void {
  clearConfigCache();
  setConfigPath(path.join(tmpDir, 'missing.yaml'));
  setLogLevel(null);
  if (fs.existsSync(logFile)) fs.unlinkSync(logFile);
  setLogFile(logFile);
}

test('formatLogLine includes level, message and context', () => {
  const line = formatLogLine('debug', 'x', { n: 1 });
  assert(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[DEBUG\] x \{"n":1\}\n$/.test(line), `unexpected line: ${line}`);
});

test('formatLogLine without context', () => {
  assert(formatLogLine('info', 'hello').endsWith('] [INFO] hello\n'), 'should end with level and message');
});

test('level comes from config by default', () => {
  reset();
  assertEqual(getLogLevel(), 'warn');
  assertEqual(isLevelEnabled('info'), false);
  assertEqual(isLevelEnabled('warn'), true);
  assertEqual(isLevelEnabled('error'), true);
});

test('config override changes the level', () => {
  reset();
  setConfigOverrides({ 'logging.level': 'info' });
  assertEqual(getLogLevel(), 'info');
  assertEqual(isLevelEnabled('debug'), false);
  assertEqual(isLevelEnabled('info'), true);
});

test('disabled levels write nothing', () => {
  reset();
  logDebug('hidden');
  logInfo('hidden too');
  assertEqual(fs.existsSync(logFile), false);
});

test('setLogLevel forces the level and lines go to the log file', () => {
  reset();
  setLogLevel('debug');
  logDebug('first', { n: 1 });
  logInfo('second');
  const lines = fs.readFileSync(logFile, 'utf8').split('\n');
  assertEqual(lines.length, 3);
  assert(lines[0].endsWith('] [DEBUG] first {"n":1}'), `unexpected line: ${lines[0]}`);
  assert(lines[1].endsWith('] [INFO] second'), `unexpected line: ${lines[1]}`);
  assertEqual(lines[2], '');
});

// Cleanup
setLogLevel(null);
setLogFile(null);
clearConfigCache();
fs.rmSync(tmpDir, { recursive: true, force: true });

summary();
