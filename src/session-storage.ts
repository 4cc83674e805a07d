import fs from "node:fs/promises";
import path from "node:path";
import { sessionSchema } from "./schemas";
import type { Session } from "./types";

export interface SessionStorage {
  storeSession(session: Session): Promise<boolean>;
  loadSession(id: string): Promise<Session | null>;
  deleteSession(id: string): Promise<boolean>;
}

/**
 * Keeps one JSON file per session id under `directory`.
 */
export class FileSessionStorage implements SessionStorage {
  constructor(readonly directory: string) {}

  private filePath(id: string): string {
    const safeId = id.replace(/[^A-Za-z0-9._-]/g, "_");
    return path.join(this.directory, `${safeId}.json`);
  }

  async storeSession(session: Session): Promise<boolean> {
    await fs.mkdir(this.directory, { recursive: true });
    await fs.writeFile(this.filePath(session.id), JSON.stringify(session), {
      encoding: "utf8",
      mode: 0o600,
    });
    return true;
  }

  async loadSession(id: string): Promise<Session | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath(id), "utf8");
    } catch {
      return null;
    }
    try {
      const parsed = sessionSchema.safeParse(JSON.parse(raw));
      return parsed.success ? Object.freeze(parsed.data) : null;
    } catch {
      return null;
    }
  }

  async deleteSession(id: string): Promise<boolean> {
    try {
      await fs.unlink(this.filePath(id));
      return true;
    } catch {
      return false;
    }
  }
}
