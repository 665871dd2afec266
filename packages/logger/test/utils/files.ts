import fs from "node:fs";
import path from "node:path";

type IoError = {code: string};

/** Wait for a file matching `filenameRx` to exist with some content, then return its contents */
export async function readFileWhenExists(dirpath: string, filenameRx: RegExp): Promise<string> {
  for (let i = 0; i < 200; i++) {
    try {
      const files = fs.readdirSync(dirpath);
      const filename = files.find((file) => filenameRx.test(file));
      if (filename !== undefined) {
        const data = fs.readFileSync(path.join(dirpath, filename), "utf8").trim();
        // Winston creates the file before writing to it
        if (data) return data;
      }
    } catch (e) {
      if ((e as IoError).code !== "ENOENT") throw e;
    }
    await new Promise((r) => setTimeout(r, 10));
  }
  throw Error("Timeout");
}
