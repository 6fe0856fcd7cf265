import { z } from "zod";

import { InvalidConverterError, UnknownConverterError } from "./errors.js";

/** JSON value accepted as converter parameters. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

/** Shape of a persisted converter description. */
export const converterDescriptorSchema = z.object({
  kind: z
    .string()
    .min(1, "converter kind must not be empty")
    .regex(/^[A-Za-z0-9_.:-]+$/, "converter kind may only contain letters, digits and _.:-"),
  params: jsonValueSchema,
});

/**
 * Pure conversion from an edge value to a numeric weight. The converter is not
 * a bare function: its {@link kind} and {@link params} describe it well enough
 * for a {@link WeightConverterRegistry} to rebuild it after deserialization.
 */
export interface WeightConverter<W> {
  readonly kind: string;
  readonly params: JsonValue;
  toWeight(value: W): number;
}

/** Serializable description of a converter, as written to the wire. */
export interface WeightConverterDescriptor {
  readonly kind: string;
  readonly params: JsonValue;
}

/**
 * Ensures a converter can be persisted. Called by the adapters at construction
 * so an unpersistable converter is reported before any I/O takes place.
 */
export function assertPersistableConverter<W>(converter: WeightConverter<W>): WeightConverterDescriptor {
  if (typeof converter?.toWeight !== "function") {
    throw new InvalidConverterError("weight converter must expose a toWeight() function");
  }
  const parsed = converterDescriptorSchema.safeParse({ kind: converter.kind, params: converter.params });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidConverterError(`weight converter is not persistable: ${issue?.message ?? "invalid descriptor"}`, {
      kind: converter.kind,
      path: issue?.path.join("."),
    });
  }
  return parsed.data;
}

/** Rebuilds a converter from its persisted parameters. */
export type WeightConverterFactory = (params: JsonValue) => WeightConverter<never>;

/**
 * Maps converter kinds back to factories when a stream is read. Registries are
 * plain instances so callers can scope custom converters to their own codecs.
 */
export class WeightConverterRegistry {
  private readonly factories = new Map<string, WeightConverterFactory>();

  constructor(factories: Iterable<[string, WeightConverterFactory]> = []) {
    for (const [kind, factory] of factories) {
      this.register(kind, factory);
    }
  }

  /** Registry preloaded with the built-in `identity`, `property` and `scaled` converters. */
  static withBuiltins(): WeightConverterRegistry {
    return new WeightConverterRegistry([
      [IDENTITY_KIND, () => identityConverter()],
      [PROPERTY_KIND, (params) => propertyConverter(parseParams(PROPERTY_KIND, propertyParamsSchema, params).field)],
      [SCALED_KIND, (params) => {
        const parsed = parseParams(SCALED_KIND, scaledParamsSchema, params);
        return scaledConverter(parsed.factor, parsed.field ?? undefined);
      }],
    ]);
  }

  register(kind: string, factory: WeightConverterFactory): this {
    const parsed = converterDescriptorSchema.shape.kind.safeParse(kind);
    if (!parsed.success) {
      throw new InvalidConverterError(`cannot register converter: ${parsed.error.issues[0]?.message ?? "invalid kind"}`, {
        kind,
      });
    }
    this.factories.set(kind, factory);
    return this;
  }

  has(kind: string): boolean {
    return this.factories.has(kind);
  }

  /** Rebuilds the converter; the caller vouches for the value type `W`. */
  resolve<W>(descriptor: WeightConverterDescriptor): WeightConverter<W> {
    const factory = this.factories.get(descriptor.kind);
    if (!factory) {
      throw new UnknownConverterError(descriptor.kind);
    }
    return factory(descriptor.params);
  }
}

const IDENTITY_KIND = "identity";
const PROPERTY_KIND = "property";
const SCALED_KIND = "scaled";

const propertyParamsSchema = z.object({ field: z.string().min(1) });
const scaledParamsSchema = z.object({ factor: z.number().finite(), field: z.string().min(1).nullable().optional() });

function parseParams<S extends z.ZodTypeAny>(kind: string, schema: S, params: JsonValue): z.output<S> {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    throw new InvalidConverterError(`invalid params for converter '${kind}': ${parsed.error.issues[0]?.message ?? "invalid"}`, {
      kind,
    });
  }
  return parsed.data;
}

/** Uses numeric edge values directly as weights. */
export function identityConverter(): WeightConverter<number> {
  return {
    kind: IDENTITY_KIND,
    params: null,
    toWeight: (value) => value,
  };
}

/** Reads the numeric `field` of object edge values. */
export function propertyConverter(field: string): WeightConverter<Record<string, unknown>> {
  return {
    kind: PROPERTY_KIND,
    params: { field },
    toWeight: (value) => readNumericField(value, field),
  };
}

/**
 * Multiplies the edge value (or its numeric `field`) by `factor`. Handy when
 * values carry a unit that differs from the one expected by weighted algorithms.
 */
export function scaledConverter(factor: number, field?: string): WeightConverter<number | Record<string, unknown>> {
  return {
    kind: SCALED_KIND,
    params: field === undefined ? { factor, field: null } : { factor, field },
    toWeight: (value) => {
      if (typeof value === "number") {
        return value * factor;
      }
      if (field === undefined) {
        throw new TypeError("scaled converter without a field expects numeric values");
      }
      return readNumericField(value, field) * factor;
    },
  };
}

function readNumericField(value: Record<string, unknown>, field: string): number {
  const raw = value[field];
  if (typeof raw !== "number") {
    throw new TypeError(`edge value field '${field}' is not a number`);
  }
  return raw;
}
