import { Readable } from "node:stream";
import { buffer } from "node:stream/consumers";
import { ObjectStore } from "./types";

export interface StoredObject {
  body: Buffer;
  contentType: string;
}

export class InMemoryObjectStore implements ObjectStore {
  private readonly objects = new Map<string, StoredObject>();
  private readonly name: string;

  constructor(name = "memory") {
    this.name = name;
  }

  async exists(key: string): Promise<boolean> {
    return this.objects.has(key);
  }

  async put(key: string, body: Readable, contentType: string): Promise<void> {
    const bytes = await buffer(body);
    this.objects.set(key, { body: bytes, contentType });
  }

  describe(): string {
    return `memory://${this.name}`;
  }

  get(key: string): StoredObject | undefined {
    return this.objects.get(key);
  }

  keys(): string[] {
    return [...this.objects.keys()];
  }

  seed(key: string, body: string | Buffer, contentType = "application/pdf"): void {
    this.objects.set(key, { body: Buffer.isBuffer(body) ? body : Buffer.from(body), contentType });
  }
}
