// Artifact naming utilities
// Dump files are named <database>_<YYYYMMDD_HHMMSS>.sql inside the working directory

import * as path from 'path';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local-time stamp in YYYYMMDD_HHMMSS form
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

// Names may contain separators and dot segments; keep the file inside workDir
function safeFileStem(database: string): string {
  return encodeURIComponent(database);
}

export function artifactFileName(database: string, createdAt: Date): string {
  return `${safeFileStem(database)}_${formatTimestamp(createdAt)}.sql`;
}

export function artifactPath(workDir: string, database: string, createdAt: Date): string {
  return path.join(workDir, artifactFileName(database, createdAt));
}
