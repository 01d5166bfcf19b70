/**
 * The 47 prefectures, in JIS X 0401 order (index + 1 = JIS code).
 */

export const PREFECTURE_CODES = [
  'hokkaido', 'aomori', 'iwate', 'miyagi', 'akita', 'yamagata', 'fukushima',
  'ibaraki', 'tochigi', 'gunma', 'saitama', 'chiba', 'tokyo', 'kanagawa',
  'niigata', 'toyama', 'ishikawa', 'fukui', 'yamanashi', 'nagano', 'gifu',
  'shizuoka', 'aichi', 'mie', 'shiga', 'kyoto', 'osaka', 'hyogo', 'nara',
  'wakayama', 'tottori', 'shimane', 'okayama', 'hiroshima', 'yamaguchi',
  'tokushima', 'kagawa', 'ehime', 'kochi', 'fukuoka', 'saga', 'nagasaki',
  'kumamoto', 'oita', 'miyazaki', 'kagoshima', 'okinawa',
] as const

export type PrefectureCode = (typeof PREFECTURE_CODES)[number]

export function isPrefectureCode(value: string): value is PrefectureCode {
  return PREFECTURE_CODES.some(code => code === value)
}

/** Two-digit JIS code, e.g. 'tokyo' → '13'. */
export function jisCodeOf(code: PrefectureCode): string {
  return String(PREFECTURE_CODES.indexOf(code) + 1).padStart(2, '0')
}
