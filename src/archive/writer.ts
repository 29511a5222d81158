import fs from "node:fs";
import type { Logger } from "../observability";

export interface DigestWriter {
  write(filePath: string, content: string): Promise<void>;
}

export class FileDigestWriter implements DigestWriter {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async write(filePath: string, content: string): Promise<void> {
    await fs.promises.writeFile(filePath, content, "utf-8");
    this.logger.debug("digest_written", { path: filePath, bytes: Buffer.byteLength(content, "utf-8") });
  }
}
