export type MediaKind = 'photo' | 'video' | 'audio' | 'document';

const EXTENSIONS: Array<[MediaKind, string[]]> = [
  ['photo', ['.jpg', '.jpeg', '.png', '.webp']],
  ['video', ['.mp4', '.mov', '.webm', '.m4v']],
  ['audio', ['.mp3', '.wav', '.ogg', '.m4a', '.flac', '.aac']],
];

// Тип медиа по расширению в пути ссылки; всё неизвестное (включая gif) отправляем документом
export function detectMediaKind(url: string): MediaKind {
  let pathname: string;
  try {
    pathname = new URL(url).pathname.toLowerCase();
  } catch {
    pathname = url.split('?')[0].toLowerCase();
  }
  for (const [kind, extensions] of EXTENSIONS) {
    if (extensions.some((ext) => pathname.endsWith(ext))) {
      return kind;
    }
  }
  return 'document';
}
