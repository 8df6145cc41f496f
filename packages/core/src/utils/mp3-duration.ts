import { parseBuffer } from "music-metadata";

/**
 * Spoken length of MP3 audio. Every frame is scanned, so VBR files without a
 * Xing header still get an exact length. Returns undefined when the parser
 * finds no duration; a stream it cannot parse rejects.
 */
export async function readMp3Duration(
  bytes: Uint8Array
): Promise<number | undefined> {
  const metadata = await parseBuffer(
    bytes,
    { mimeType: "audio/mpeg", size: bytes.byteLength },
    { duration: true, skipCovers: true }
  );
  const duration = metadata.format.duration;
  return duration !== undefined && duration > 0 ? duration : undefined;
}
