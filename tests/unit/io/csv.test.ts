import {
  InputFormatError,
  formatExtractionCsv,
  formatParsedCsv,
  parseArticleInputs,
  parseExtractionRecords,
  parseWhitelistEntries,
} from 'src/io/csv';
import { SpeakerWhitelist } from 'src/parse/speakerWhitelist';

describe('parseArticleInputs', () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warn.mockRestore();
  });

  it('skips rows without ID or URL and keeps odd dates, warning about each', async () => {
    const text = [
      '\uFEFFID,date,source',
      '1,2024-10-19,https://kabar.example.id/berita/1',
      ',2024-10-19,https://kabar.example.id/berita/2',
      '3,2024-10-19,ftp://kabar.example.id/berita/3',
      '4,19/10/2024,https://kabar.example.id/berita/4',
      '',
      '5, 2024-10-20 ,"https://kabar.example.id/berita/5?a=1,2"',
    ].join('\n');

    const inputs = await parseArticleInputs(text);

    expect(inputs).toEqual([
      { id: '1', date: '2024-10-19', sourceUrl: 'https://kabar.example.id/berita/1' },
      { id: '4', date: '19/10/2024', sourceUrl: 'https://kabar.example.id/berita/4' },
      { id: '5', date: '2024-10-20', sourceUrl: 'https://kabar.example.id/berita/5?a=1,2' },
    ]);
    expect(warn).toHaveBeenCalledTimes(3);
    expect(warn).toHaveBeenCalledWith('[csv] Keeping input row with unrecognised date', {
      line: 5,
      id: '4',
      date: '19/10/2024',
    });
  });

  it('rejects files without the required columns', async () => {
    await expect(parseArticleInputs('ID,date\n1,2024-10-19\n')).rejects.toThrow(
      'input CSV is missing column(s) source; found ID, date',
    );
    await expect(parseArticleInputs('')).rejects.toBeInstanceOf(InputFormatError);
  });
});

describe('extraction CSV', () => {
  const record = {
    id: '1',
    dateArticle: '2024-10-19',
    ingestionTime: '2024-10-20 01:02:03',
    sourceUrl: 'https://kabar.example.id/berita/1',
    content: '"Kami siap," ujar Hendi.\n\n---PAGE BREAK---\n\nHalaman dua, selesai.',
  };

  it('writes a quoted header and rows', async () => {
    const csv = await formatExtractionCsv([record, { ...record, id: '2', content: '' }]);
    const lines = csv.split('\n');

    expect(lines[0]).toBe('"ID","date_article","ingestion_time","source","content"');
    expect(lines[1]).toBe(
      '"1","2024-10-19","2024-10-20 01:02:03","https://kabar.example.id/berita/1","""Kami siap,"" ujar Hendi.',
    );
    expect(csv.endsWith('"2","2024-10-19","2024-10-20 01:02:03","https://kabar.example.id/berita/1",""\n')).toBe(true);
  });

  it('reads back what it wrote', async () => {
    const csv = await formatExtractionCsv([record]);

    await expect(parseExtractionRecords(csv)).resolves.toEqual([record]);
  });

  it('requires ID, source and content', async () => {
    await expect(parseExtractionRecords('ID,source\n1,https://a.example\n')).rejects.toThrow(
      'extraction CSV is missing column(s) content',
    );
  });
});

describe('formatParsedCsv', () => {
  it('writes missing locations as empty cells', async () => {
    const csv = await formatParsedCsv([
      {
        id: '1',
        date: '2024-10-19',
        sourceUrl: 'https://kabar.example.id/berita/1',
        quote: 'Kami siap',
        speaker: 'Hendi',
        province: 'Jawa Tengah',
        city: null,
      },
    ]);

    expect(csv).toBe(
      '"id","date","source","quote","speaker","province","city"\n' +
        '"1","2024-10-19","https://kabar.example.id/berita/1","Kami siap","Hendi","Jawa Tengah",""\n',
    );
  });

  it('writes only the header when there are no rows', async () => {
    await expect(formatParsedCsv([])).resolves.toBe('"id","date","source","quote","speaker","province","city"\n');
  });

  it('appends the matched whitelist entry when a whitelist is given', async () => {
    const whitelist = new SpeakerWhitelist([
      { fullname: 'Hendrar Prihadi', jabatan: 'Kepala LKPP', category: 'eksekutif', alias: 'hendi,hendrar' },
    ]);
    const row = {
      id: '1',
      date: '2024-10-19',
      sourceUrl: 'https://kabar.example.id/berita/1',
      quote: 'Kami siap',
      speaker: 'Hendi',
      province: null,
      city: null,
    };

    const csv = await formatParsedCsv([row, { ...row, speaker: 'Warga' }], whitelist);

    expect(csv.split('\n')).toEqual([
      '"id","date","source","quote","speaker","province","city","jabatan","category","alias","fullname"',
      '"1","2024-10-19","https://kabar.example.id/berita/1","Kami siap","Hendi","","","Kepala LKPP","eksekutif","hendi,hendrar","Hendrar Prihadi"',
      '"1","2024-10-19","https://kabar.example.id/berita/1","Kami siap","Warga","","","","","",""',
      '',
    ]);
  });
});

describe('parseWhitelistEntries', () => {
  it('maps nama to fullname and lower-cases aliases', async () => {
    const text = ['nama,jabatan,category,alias', 'Puan Maharani,Ketua DPR,legislatif,"Puan, Mbak Puan"'].join('\n');

    await expect(parseWhitelistEntries(text)).resolves.toEqual([
      { fullname: 'Puan Maharani', jabatan: 'Ketua DPR', category: 'legislatif', alias: 'puan, mbak puan' },
    ]);
  });

  it('leaves optional columns empty', async () => {
    await expect(parseWhitelistEntries('nama,alias\nBudi,budi\n')).resolves.toEqual([
      { fullname: 'Budi', jabatan: '', category: '', alias: 'budi' },
    ]);
  });

  it('requires the nama and alias columns', async () => {
    await expect(parseWhitelistEntries('nama,jabatan\nBudi,Menteri\n')).rejects.toThrow(
      'whitelist CSV is missing column(s) alias; found nama, jabatan',
    );
  });
});
