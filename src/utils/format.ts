import { errorCodeName } from '../coordinator/control-types.js';
import type { StatusSnapshot } from '../coordinator/control-types.js';

const UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

export function formatBytes(bytes: number): string {
  if (bytes <= 0) return '0 B';
  const k = 1024;
  const i = Math.max(0, Math.min(UNITS.length - 1, Math.floor(Math.log(bytes) / Math.log(k))));
  return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + UNITS[i];
}

export function formatRate(bytesPerSecond: number): string {
  return `${formatBytes(bytesPerSecond)}/s`;
}

/** h:mm:ss, or m:ss under an hour. */
export function formatDuration(ms: number): string {
  const total = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = total % 60;
  const ss = String(seconds).padStart(2, '0');
  if (hours > 0) {
    return `${hours}:${String(minutes).padStart(2, '0')}:${ss}`;
  }
  return `${minutes}:${ss}`;
}

/** One status line for the CLI. */
export function describeSnapshot(snapshot: StatusSnapshot): string {
  const parts: string[] = [snapshot.state];
  if (snapshot.serverName) {
    parts.push(snapshot.serverName);
  }
  if (snapshot.state === 'connected') {
    parts.push(formatDuration(snapshot.elapsedMs));
  }
  if (snapshot.statistics) {
    const s = snapshot.statistics;
    parts.push(`down ${formatRate(s.downloadRate)} (${formatBytes(s.bytesReceived)})`);
    parts.push(`up ${formatRate(s.uploadRate)} (${formatBytes(s.bytesSent)})`);
  }
  if (snapshot.reconnection && snapshot.state === 'reconnecting') {
    const r = snapshot.reconnection;
    parts.push(`attempt ${r.attempt}/${r.maxAttempts}`);
  }
  if (snapshot.lastError) {
    const { code, message } = snapshot.lastError;
    parts.push(`error ${code} ${errorCodeName(code)}: ${message}`);
  }
  if (snapshot.warning) {
    parts.push(`warning: ${snapshot.warning.message}`);
  }
  return parts.join(' | ');
}
