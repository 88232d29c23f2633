import yazl from "yazl";

export interface ArchiveEntry {
  name: string;
  data: Buffer;
}

/** Builds a zip in memory; entries keep the given order. */
export function buildZip(entries: readonly ArchiveEntry[]): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const zip = new yazl.ZipFile();
    const chunks: Buffer[] = [];

    zip.outputStream
      .on("data", (chunk: Buffer) => chunks.push(chunk))
      .on("error", reject)
      .on("end", () => resolve(Buffer.concat(chunks)));

    for (const entry of entries) {
      zip.addBuffer(entry.data, entry.name, { compress: false });
    }

    zip.end();
  });
}
