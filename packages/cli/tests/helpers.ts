import { Writable } from 'node:stream';
import { encodeDocument, writeArchive } from '@schemashift/archive';

export interface CapturedStream {
  stream: Writable;
  text(): string;
}

/** In-memory stream collecting everything written to it */
export function captureStream(): CapturedStream {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString('utf-8'));
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

/** Write a minimal project archive with one label and one log */
export async function writeProject(filePath: string, label: string, log = ''): Promise<void> {
  await writeArchive(
    new Map<string, Uint8Array>([
      ['project.xml', encodeDocument(`<Project><Label>${label}</Label></Project>`, { encoding: 'utf-16le', bom: true })],
      ['run.log', Buffer.from(log, 'utf-8')],
    ]),
    filePath
  );
}
