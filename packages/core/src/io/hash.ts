import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import type { ContentHasher } from "../collaborators.js";

export class Sha256Hasher implements ContentHasher {
  async hashFile(path: string) {
    const hash = createHash("sha256");
    for await (const chunk of createReadStream(path)) {
      hash.update(chunk);
    }
    return hash.digest("hex");
  }
}
