import type { z } from "zod";

import { GraphFormatError } from "../graph/errors.js";
import type { BinaryReader, BinaryWriter } from "./binary.js";

/**
 * Persistence contract for nodes and edge values. The {@link kind} is written
 * to the stream header so a reader can detect a mismatched codec before
 * decoding any element.
 */
export interface ValueCodec<T> {
  readonly kind: string;
  write(writer: BinaryWriter, value: T): void;
  read(reader: BinaryReader): T;
}

export const stringCodec: ValueCodec<string> = {
  kind: "string",
  write: (writer, value) => {
    writer.writeString(value);
  },
  read: (reader) => reader.readString(),
};

export const float64Codec: ValueCodec<number> = {
  kind: "float64",
  write: (writer, value) => {
    writer.writeFloat64(value);
  },
  read: (reader) => reader.readFloat64(),
};

export const int32Codec: ValueCodec<number> = {
  kind: "int32",
  write: (writer, value) => {
    if (!Number.isInteger(value) || value < -2_147_483_648 || value > 2_147_483_647) {
      throw new RangeError(`${value} is not a 32-bit integer`);
    }
    writer.writeInt32(value);
  },
  read: (reader) => reader.readInt32(),
};

export const booleanCodec: ValueCodec<boolean> = {
  kind: "boolean",
  write: (writer, value) => {
    writer.writeUint8(value ? 1 : 0);
  },
  read: (reader) => {
    const raw = reader.readUint8();
    if (raw > 1) {
      throw new GraphFormatError(`invalid boolean byte ${raw}`);
    }
    return raw === 1;
  },
};

/**
 * JSON codec validated by a zod schema on read. The optional `kind` lets
 * distinct payload shapes be told apart in the stream header.
 */
export function jsonCodec<S extends z.ZodTypeAny>(schema: S, kind = "json"): ValueCodec<z.output<S>> {
  return {
    kind,
    write: (writer, value) => {
      writer.writeString(JSON.stringify(value));
    },
    read: (reader) => {
      const text = reader.readString();
      let raw: unknown;
      try {
        raw = JSON.parse(text);
      } catch (error) {
        throw new GraphFormatError(`malformed JSON element: ${error instanceof Error ? error.message : String(error)}`);
      }
      const parsed = schema.safeParse(raw);
      if (!parsed.success) {
        throw new GraphFormatError(`JSON element rejected by schema: ${parsed.error.issues[0]?.message ?? "invalid"}`, {
          kind,
        });
      }
      return parsed.data;
    },
  };
}
