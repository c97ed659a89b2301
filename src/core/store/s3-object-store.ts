/**
 * S3ObjectStore - ObjectStore backed by Amazon S3
 */

import {
  DeleteObjectCommand,
  GetObjectCommand,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import { Readable } from "stream";
import { ObjectBody, ObjectStore } from "./object-store";

export class S3ObjectStore implements ObjectStore {
  constructor(private client: S3Client) {}

  async openObject(location: string, key: string): Promise<AsyncIterable<Uint8Array>> {
    const response = await this.client.send(
      new GetObjectCommand({ Bucket: location, Key: key })
    );

    const body = response.Body;
    if (!body) {
      throw new Error(`object "${key}" in "${location}" has no body`);
    }

    return bodyChunks(body);
  }

  async putObject(
    location: string,
    key: string,
    body: ObjectBody,
    contentType?: string
  ): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: location,
        Key: key,
        Body: body,
        ContentType: contentType,
      })
    );
  }

  async deleteObject(location: string, key: string): Promise<void> {
    await this.client.send(new DeleteObjectCommand({ Bucket: location, Key: key }));
  }
}

/** The parts of a GetObject response body this store reads. */
export type S3ResponseBody = Readable | { transformToByteArray(): Promise<Uint8Array> };

export function bodyChunks(body: S3ResponseBody): AsyncIterable<Uint8Array> {
  // Node runtime hands back an IncomingMessage; stream it as it arrives
  if (body instanceof Readable) {
    return readableChunks(body);
  }
  return wholeBody(body);
}

async function* readableChunks(stream: Readable): AsyncGenerator<Uint8Array> {
  for await (const chunk of stream) {
    if (chunk instanceof Uint8Array) {
      yield chunk;
    } else {
      yield Buffer.from(String(chunk));
    }
  }
}

async function* wholeBody(body: {
  transformToByteArray(): Promise<Uint8Array>;
}): AsyncGenerator<Uint8Array> {
  yield await body.transformToByteArray();
}
