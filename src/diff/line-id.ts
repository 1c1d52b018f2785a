import crypto from 'crypto';
import type { LineID } from '../types.js';

const ID_LENGTH = 16;

function digest(input: string): string {
  return crypto.createHash('sha256').update(input, 'utf8').digest('hex');
}

/**
 * Identity of a post-image line. Depends only on path and line number so a
 * refreshed diff maps surviving lines onto the same IDs.
 */
export function postImageLineId(filePath: string, newLineNumber: number): LineID {
  return digest(`${filePath}\0+${newLineNumber}`).substring(0, ID_LENGTH);
}

export function preImageLineId(filePath: string, oldLineNumber: number): LineID {
  return digest(`${filePath}\0-${oldLineNumber}`).substring(0, ID_LENGTH);
}

export function contentDigest(content: string): string {
  return digest(content).substring(0, ID_LENGTH);
}

export function diffContentHash(raw: string): string {
  return digest(raw.replace(/\r\n/g, '\n'));
}
