/**
 * File Store
 *
 * Uploaded files live under `<root>/<kind>/<teacherId>/<ulid><ext>`. Stored
 * names never come from the client; paths handed out are relative to the root
 * so they can be served with reply.sendFile.
 */

import path from "node:path";
import fs from "node:fs";
import { mkdir, writeFile, rm, copyFile } from "node:fs/promises";
import { ulid } from "ulid";
import { UPLOAD_POLICIES, type UploadKind } from "@homeroom/core";

export class FileStore {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
    if (!fs.existsSync(this.root)) {
      fs.mkdirSync(this.root, { recursive: true });
    }
  }

  private resolve(relativePath: string): string {
    const absolute = path.resolve(this.root, relativePath);
    if (!absolute.startsWith(this.root + path.sep)) {
      throw new Error(`Path escapes upload root: ${relativePath}`);
    }
    return absolute;
  }

  async save(kind: UploadKind, teacherId: string, extension: string, data: Buffer): Promise<string> {
    const relativePath = path.join(kind, teacherId, `${ulid()}${extension}`);
    const absolute = this.resolve(relativePath);
    await mkdir(path.dirname(absolute), { recursive: true });
    await writeFile(absolute, data);
    return relativePath;
  }

  async copy(relativePath: string, kind: UploadKind, teacherId: string): Promise<string> {
    const target = path.join(kind, teacherId, `${ulid()}${path.extname(relativePath)}`);
    const absolute = this.resolve(target);
    await mkdir(path.dirname(absolute), { recursive: true });
    await copyFile(this.resolve(relativePath), absolute);
    return target;
  }

  exists(relativePath: string): boolean {
    return fs.existsSync(this.resolve(relativePath));
  }

  /** Missing files are not an error */
  async remove(relativePath: string): Promise<void> {
    await rm(this.resolve(relativePath), { force: true });
  }

  async removeAll(relativePaths: Iterable<string>): Promise<void> {
    for (const relativePath of relativePaths) {
      await this.remove(relativePath);
    }
  }

  async removeTeacher(teacherId: string): Promise<void> {
    for (const kind of Object.keys(UPLOAD_POLICIES)) {
      await rm(path.join(this.root, kind, teacherId), { recursive: true, force: true });
    }
  }
}
