import { Readable } from 'stream';
import { buffer } from 'stream/consumers';
import type { ObjectContent, ObjectData } from './types.js';

/**
 * Drain an object's body into memory
 */
export async function readObjectContent(content: ObjectContent): Promise<Buffer> {
  return buffer(content.body);
}

/**
 * Release an object's body without reading it
 */
export function releaseObjectContent(content: ObjectContent): void {
  content.body.destroy();
}

export async function toBuffer(data: ObjectData): Promise<Buffer> {
  if (data instanceof Readable) {
    return buffer(data);
  }
  if (typeof data === 'string') {
    return Buffer.from(data, 'utf-8');
  }
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}
