import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { safeFileName, toCsv, writeCsv, writeJson } from '../lib/report/writers';

describe('toCsv', () => {
  test('CRLF rows, empty cells for missing values, quoting where needed', () => {
    expect(toCsv(['a', 'b'], [['x,y', undefined], [1, true], ['say "hi"', null]])).toBe(
      'a,b\r\n"x,y",\r\n1,true\r\n"say ""hi""",\r\n',
    );
  });

  test('header only when there are no rows', () => {
    expect(toCsv(['gtm_domain'], [])).toBe('gtm_domain\r\n');
  });
});

test('safeFileName replaces runs of unsafe characters', () => {
  expect(safeFileName('www.example.com')).toBe('www.example.com');
  expect(safeFileName('prop name/with:parts')).toBe('prop_name_with_parts');
});

describe('file writers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cdn-writers-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test('create parent directories', async () => {
    const file = path.join(dir, 'nested', 'deeper', 'out.csv');
    await writeCsv(file, ['a'], [['1']]);
    await expect(fs.readFile(file, 'utf8')).resolves.toBe('a\r\n1\r\n');
  });

  test('JSON is indented by two spaces with a trailing newline', async () => {
    const file = path.join(dir, 'x.json');
    await writeJson(file, { a: [1] });
    await expect(fs.readFile(file, 'utf8')).resolves.toBe('{\n  "a": [\n    1\n  ]\n}\n');
  });
});
