import { Readable } from "node:stream";
import { HeadObjectCommand, HeadObjectCommandOutput, NotFound, S3Client, S3ServiceException } from "@aws-sdk/client-s3";
import { Upload } from "@aws-sdk/lib-storage";
import { StoreQueryError } from "../core/errors";
import { ObjectStore } from "./types";

interface S3ClientLike {
  send(command: HeadObjectCommand): Promise<HeadObjectCommandOutput>;
}

export interface PutObjectParams {
  bucket: string;
  key: string;
  body: Readable;
  contentType: string;
}

type PutObjectFn = (params: PutObjectParams) => Promise<void>;

export interface S3ObjectStoreOptions {
  bucket: string;
  region?: string;
  client?: S3ClientLike;
  putObject?: PutObjectFn;
  partSizeBytes?: number;
}

const MIN_PART_SIZE_BYTES = 5 * 1024 * 1024;

export function isNotFoundError(error: unknown): boolean {
  if (error instanceof NotFound) {
    return true;
  }
  if (error instanceof S3ServiceException) {
    return error.name === "NotFound" || error.name === "NoSuchKey" || error.$metadata.httpStatusCode === 404;
  }
  return false;
}

function createMultipartPut(client: S3Client, partSizeBytes: number): PutObjectFn {
  return async ({ bucket, key, body, contentType }) => {
    // One part in flight: transfers stay sequential and memory stays at one part.
    const upload = new Upload({
      client,
      params: {
        Bucket: bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
      },
      queueSize: 1,
      partSize: partSizeBytes,
      leavePartsOnError: false,
    });
    await upload.done();
  };
}

export class S3ObjectStore implements ObjectStore {
  private readonly bucket: string;
  private readonly client: S3ClientLike;
  private readonly putObject: PutObjectFn;

  constructor(options: S3ObjectStoreOptions) {
    this.bucket = options.bucket;

    let sharedClient: S3Client | undefined;
    const getSharedClient = (): S3Client => {
      sharedClient ??= new S3Client({ region: options.region });
      return sharedClient;
    };

    this.client = options.client ?? getSharedClient();
    this.putObject =
      options.putObject ?? createMultipartPut(getSharedClient(), Math.max(options.partSizeBytes ?? MIN_PART_SIZE_BYTES, MIN_PART_SIZE_BYTES));
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      return true;
    } catch (error) {
      if (isNotFoundError(error)) {
        return false;
      }
      throw new StoreQueryError(key, { cause: error });
    }
  }

  async put(key: string, body: Readable, contentType: string): Promise<void> {
    await this.putObject({ bucket: this.bucket, key, body, contentType });
  }

  describe(): string {
    return `s3://${this.bucket}`;
  }
}
