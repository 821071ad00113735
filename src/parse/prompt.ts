import type { LlmMessage } from '../llm/llmClient';

export const extraction_instruction = `Kamu adalah analis berita yang menguasai bahasa Indonesia dan bahasa Inggris.
Tugas: ambil informasi terstruktur dari satu artikel berita.

Langkah:
1. Ambil KUTIPAN langsung (biasanya di dalam tanda kutip "...").
2. Tentukan PEMBICARA setiap kutipan dengan nama seperti tertulis di artikel (bentuk pendek).
   - "ujar Amalia" -> "Amalia", "menurut Sekda" -> "Sekda".
   - Bila kutipan hanya ditutup "katanya", "ujarnya", "tegasnya", "ungkapnya" atau "tambahnya" tanpa nama,
     pakai pembicara terdekat yang disebut SEBELUM kutipan itu.
3. Ambil KOTA/KABUPATEN bila disebut (contoh: Semarang, Asahan).
4. Ambil PROVINSI. Bila tidak disebut tetapi kota/kabupaten ada, simpulkan provinsinya
   (Semarang -> Jawa Tengah, Asahan -> Sumatera Utara, Jakarta -> DKI Jakarta).

Aturan:
- "quotes" dan "speakers" berpasangan 1:1 dengan urutan yang sama; setiap kutipan wajib punya pembicara.
- Pilih 3-5 kutipan paling relevan saja.
- Jangan mengarang. Bila tidak ada, pakai [] untuk quotes/speakers dan null untuk province/city.`;

export const output_format = `Format keluaran (JSON saja, tanpa penjelasan, tanpa markdown):
{
  "quotes": ["kutipan"],
  "speakers": ["nama pembicara"],
  "province": "nama provinsi atau null",
  "city": "nama kota atau null"
}`;

/** Cuts `content` to at most `maxChars` characters, never splitting a surrogate pair. */
export function truncateContent(content: string, maxChars: number): string {
  if (content.length <= maxChars) {
    return content;
  }
  const cut = content.slice(0, maxChars);
  const last = cut.charCodeAt(cut.length - 1);
  return last >= 0xd800 && last <= 0xdbff ? cut.slice(0, -1) : cut;
}

export function buildExtractionPrompt(content: string): LlmMessage[] {
  return [
    { role: 'system', content: `${extraction_instruction}\n\n${output_format}` },
    { role: 'user', content: `ARTIKEL:\n${content}\n\nBalas HANYA dengan JSON yang valid.` },
  ];
}
