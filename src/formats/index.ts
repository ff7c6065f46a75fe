import * as path from "path";
import { LibraryFormat } from "../types";
import { LibraryCodec } from "./codec";
import { CsvCodec } from "./csv-codec";
import { M3uCodec } from "./m3u-codec";
import { NmlCodec } from "./nml-codec";
import { RekordboxXmlCodec } from "./rekordbox-codec";

export const LIBRARY_FORMATS: readonly LibraryFormat[] = ["nml", "rekordbox-xml", "csv", "m3u", "m3u8"];

export function isLibraryFormat(value: string): value is LibraryFormat {
  return LIBRARY_FORMATS.some((format) => format === value);
}

export function formatFromPath(filePath: string): LibraryFormat {
  const ext = path.extname(filePath).toLowerCase();
  switch (ext) {
    case ".nml":
      return "nml";
    case ".xml":
      return "rekordbox-xml";
    case ".csv":
      return "csv";
    case ".m3u":
      return "m3u";
    case ".m3u8":
      return "m3u8";
    default:
      throw new Error(`Unrecognised library format for '${path.basename(filePath)}'`);
  }
}

export function codecFor(format: LibraryFormat): LibraryCodec {
  switch (format) {
    case "nml":
      return new NmlCodec();
    case "rekordbox-xml":
      return new RekordboxXmlCodec();
    case "csv":
      return new CsvCodec();
    case "m3u":
    case "m3u8":
      return new M3uCodec(format);
  }
}

export * from "./codec";
export { CsvCodec, CSV_COLUMNS } from "./csv-codec";
export { M3uCodec, playlistEntryPath } from "./m3u-codec";
export { NmlCodec } from "./nml-codec";
export { RekordboxXmlCodec, fromLocationUri, toLocationUri } from "./rekordbox-codec";
