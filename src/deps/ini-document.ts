/**
 * INI text shared by deps.ini and deps-lock.ini.
 *
 * `ini` reads dots in section headers as nesting. Dependency names are
 * literal, so unescaped dots in headers are escaped before parsing and
 * sections are returned in file order.
 */

import ini from 'ini';

const SECTION_HEADER = /^\[([^\]\r\n]*)\][^\S\r\n]*$/gm;

function escapeSectionName(name: string): string {
  return name.replace(/(?<!\\)\./g, '\\.');
}

export function parseIniDocument(text: string): Record<string, unknown> {
  const escaped = text.replace(
    SECTION_HEADER,
    (_line: string, name: string) => `[${escapeSectionName(name)}]`
  );
  const parsed: Record<string, unknown> = ini.parse(escaped);

  const ordered: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== 'object' || value === null) ordered[key] = value;
  }
  for (const match of text.matchAll(SECTION_HEADER)) {
    const name = (match[1] ?? '').trim().replace(/\\\./g, '.');
    if (Object.hasOwn(parsed, name) && !Object.hasOwn(ordered, name)) {
      ordered[name] = parsed[name];
    }
  }
  for (const [key, value] of Object.entries(parsed)) {
    if (!Object.hasOwn(ordered, key)) ordered[key] = value;
  }
  return ordered;
}

/** Render sections of string or boolean values; dots in section names are escaped */
export function serializeIniDocument(doc: Record<string, Record<string, string | boolean>>): string {
  return ini.stringify(doc, { whitespace: true });
}
