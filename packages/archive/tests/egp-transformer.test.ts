import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SchemashiftError } from '@schemashift/core';
import { MappingTable } from '@schemashift/rewrite-core';
import {
  EgpTransformer,
  createEgpTransformer,
  decodeDocument,
  encodeDocument,
  readArchive,
  writeArchive,
  type ArchiveEntries,
} from '../src/index.js';

const table = MappingTable.fromConfig([
  { source_schema: 'WORK', target_schema: 'bronze', source_table: 'ORDERS', target_table: 'orders' },
  { source_schema: 'WORK', target_schema: 'staging' },
]);

const PROJECT = [
  '<Project>',
  '<Label>WORK.ORDERS</Label>',
  '<TaskCode>SELECT * FROM WORK.ITEMS;</TaskCode>',
  '<LibraryName>WORK</LibraryName>',
  '</Project>',
].join('\n');

const utf16Document = (text: string): Uint8Array => encodeDocument(text, { encoding: 'utf-16le', bom: true });

function fixtureEntries(document: Uint8Array | undefined): ArchiveEntries {
  const entries: ArchiveEntries = new Map();
  if (document) entries.set('project.xml', document);
  entries.set('logs/Run.LOG', Buffer.from('NOTE: Table WORK.ORDERS created.\n', 'utf-8'));
  entries.set('logs/quiet.log', Buffer.from('NOTE: nothing to see\n', 'utf-8'));
  entries.set('results/report.html', Buffer.from('<p>WORK.ORDERS</p>', 'utf-8'));
  return entries;
}

describe('EgpTransformer', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'schemashift-egp-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('handles .egp files regardless of case', () => {
    const transformer = new EgpTransformer();

    expect(transformer.canHandle('Monthly.EGP')).toBe(true);
    expect(transformer.canHandle('monthly.egp')).toBe(true);
    expect(transformer.canHandle('monthly.zip')).toBe(false);
  });

  it('rewrites project.xml and changed logs', async () => {
    const input = join(dir, 'in.egp');
    const output = join(dir, 'out', 'in.egp');
    await writeArchive(fixtureEntries(utf16Document(PROJECT)), input);

    const result = await createEgpTransformer().transform(input, output, table);

    expect(result.success).toBe(true);
    expect(result.transformer).toBe('egp');
    expect(result.outputPath).toBe(output);
    expect(result.transformationsApplied).toBe(4);
    expect(result.warnings).toEqual([]);
    expect(result.report?.document.status).toBe('processed');
    expect(result.report?.logs).toEqual([
      { name: 'logs/Run.LOG', scanned: 1, matches: 1 },
      { name: 'logs/quiet.log', scanned: 0, matches: 0 },
    ]);

    const written = await readArchive(output);
    const document = decodeDocument(written.get('project.xml') ?? new Uint8Array());

    expect(document).toEqual({
      text: [
        '<Project>',
        '<Label>bronze.orders</Label>',
        '<TaskCode>SELECT * FROM staging.ITEMS;</TaskCode>',
        '<LibraryName>bronze</LibraryName>',
        '</Project>',
      ].join('\n'),
      encoding: 'utf-16le',
      bom: true,
    });
    expect(Buffer.from(written.get('logs/Run.LOG') ?? []).toString('utf-8')).toBe(
      'NOTE: Table bronze.orders created.\n'
    );
    expect(Buffer.from(written.get('results/report.html') ?? []).toString('utf-8')).toBe('<p>WORK.ORDERS</p>');
  });

  it('keeps every entry byte-identical with an empty mapping table', async () => {
    const input = join(dir, 'in.egp');
    const output = join(dir, 'out.egp');
    const entries = fixtureEntries(utf16Document(PROJECT));
    await writeArchive(entries, input);

    const result = await new EgpTransformer().transform(input, output, MappingTable.empty());
    const written = await readArchive(output);

    expect(result.success).toBe(true);
    expect(result.transformationsApplied).toBe(0);
    expect(Array.from(written.keys()).sort()).toEqual(Array.from(entries.keys()).sort());
    for (const [name, bytes] of entries) {
      expect(Buffer.from(written.get(name) ?? []).equals(Buffer.from(bytes))).toBe(true);
    }
  });

  it('leaves an undecodable document alone and still rewrites logs', async () => {
    const input = join(dir, 'in.egp');
    const output = join(dir, 'out.egp');
    const broken = new Uint8Array([0xc3, 0x28, 0x41]);
    await writeArchive(fixtureEntries(broken), input);

    const result = await new EgpTransformer().transform(input, output, table);
    const written = await readArchive(output);

    expect(result.success).toBe(true);
    expect(result.warnings).toEqual([
      'project.xml: Document is not valid utf-16le, utf-16be, utf-8; left unchanged',
    ]);
    expect(result.report?.document.status).toBe('decode_failed');
    expect(result.transformationsApplied).toBe(1);
    expect(Array.from(written.get('project.xml') ?? [])).toEqual([0xc3, 0x28, 0x41]);
  });

  it('warns when the archive has no project.xml', async () => {
    const input = join(dir, 'in.egp');
    await writeArchive(fixtureEntries(undefined), input);

    const result = await new EgpTransformer().transform(input, join(dir, 'out.egp'), table);

    expect(result.success).toBe(true);
    expect(result.warnings).toEqual(['project.xml not found in archive']);
    expect(result.report?.document.status).toBe('absent');
  });

  it('reports a file that is not a zip archive', async () => {
    const input = join(dir, 'broken.egp');
    writeFileSync(input, 'definitely not a zip');

    const result = await new EgpTransformer().transform(input, join(dir, 'out.egp'), table);

    expect(result.success).toBe(false);
    expect(result.transformationsApplied).toBe(0);
    expect(result.error).toMatch(/^Not a valid project archive: /);
  });

  it('writes nothing once its signal is aborted', async () => {
    const input = join(dir, 'in.egp');
    const output = join(dir, 'out.egp');
    await writeArchive(fixtureEntries(utf16Document(PROJECT)), input);
    const controller = new AbortController();
    controller.abort(new SchemashiftError({ code: 'TIMEOUT', message: 'Timed out after 5ms' }));

    const result = await new EgpTransformer().transform(input, output, table, { signal: controller.signal });

    expect(result.success).toBe(false);
    expect(result.error).toBe('Timed out after 5ms');
    expect(existsSync(output)).toBe(false);
  });

  it('reports a missing input file', async () => {
    const input = join(dir, 'missing.egp');
    const result = await new EgpTransformer().transform(input, join(dir, 'out.egp'), table);

    expect(result.success).toBe(false);
    expect(result.error).toBe(`File not found: ${input}`);
  });
});
