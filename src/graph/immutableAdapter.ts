import type { Buffer } from "node:buffer";

import { BinaryReader, BinaryWriter } from "../codec/binary.js";
import {
  assertStreamConsumed,
  readGraphStream,
  writeGraphStream,
  type GraphStreamCodecs,
  type GraphStreamLimits,
} from "../codec/graphCodec.js";
import { loadAdapterConfig } from "../config/adapterConfig.js";
import { BaseValueGraphAdapter, type AdapterOptions } from "./baseAdapter.js";
import { WeightConverterRegistry, type WeightConverter } from "./converters.js";
import { GraphAdapterError, GraphImmutableError, StructuralCopyError } from "./errors.js";
import type { GraphMutation, GraphTypeDescriptor, NodeKeyFn } from "./types.js";
import { copyValueGraph, type ImmutableValueGraph } from "./valueGraph.js";

/** Structural copy primitive invoked by {@link ImmutableValueGraphAdapter.clone}. */
export type StructuralCopy = <N, W>(graph: ImmutableValueGraph<N, W>) => ImmutableValueGraph<N, W>;

export interface ImmutableAdapterOptions extends AdapterOptions {
  /** Overrides the copy used when cloning. Defaults to {@link copyValueGraph}. */
  readonly structuralCopy?: StructuralCopy;
}

/** Codecs, registry and limits used to rebuild an adapter from bytes. */
export interface DeserializeOptions<N, W> extends GraphStreamCodecs<N, W>, ImmutableAdapterOptions {
  /** Resolves the persisted converter. Defaults to the built-in converters. */
  readonly converters?: WeightConverterRegistry;
  /** Count limits; defaults to the resolved runtime configuration. */
  readonly limits?: GraphStreamLimits;
  /** Equality key of the rebuilt nodes (needed for object nodes). */
  readonly nodeKey?: NodeKeyFn<N>;
}

/**
 * Graph adapter over an {@link ImmutableValueGraph}. Edges are
 * {@link EndpointPair}s and weights are derived from the edge values through
 * the weight converter, so the resulting graph is weighted and unmodifiable.
 *
 * ```ts
 * const values = ValueGraphBuilder.directed().allowsSelfLoops(true).build<string, { km: number }>();
 * values.putEdgeValue("v1", "v2", { km: 5 });
 *
 * const graph = new ImmutableValueGraphAdapter(ImmutableValueGraph.copyOf(values), propertyConverter("km"));
 * graph.getEdgeWeight(EndpointPair.ordered("v1", "v2")); // 5
 * ```
 *
 * Concurrent reads are safe as long as the wrapped graph and the converter
 * are; the adapter itself holds no lock.
 */
export class ImmutableValueGraphAdapter<N, W> extends BaseValueGraphAdapter<N, W, ImmutableValueGraph<N, W>> {
  private readonly structuralCopy: StructuralCopy;

  constructor(valueGraph: ImmutableValueGraph<N, W>, converter: WeightConverter<W>, options: ImmutableAdapterOptions = {}) {
    super(valueGraph, converter, options);
    this.structuralCopy = options.structuralCopy ?? copyValueGraph;
  }

  /** Every mutation is rejected before the wrapped graph is touched. */
  protected applyMutation(mutation: GraphMutation<N>): never {
    this.logger?.debug("graph_mutation_rejected", { operation: mutation.kind });
    throw new GraphImmutableError(mutation.kind);
  }

  getType(): GraphTypeDescriptor {
    return super.getType().asUnmodifiable();
  }

  /**
   * Returns an adapter sharing this converter but owning a structural copy of
   * the wrapped graph. Cached vertex/edge views are rebuilt lazily.
   */
  clone(): ImmutableValueGraphAdapter<N, W> {
    let copy: ImmutableValueGraph<N, W>;
    try {
      copy = this.structuralCopy(this.valueGraph);
    } catch (error) {
      const failure = new StructuralCopyError(error);
      this.logger?.error("graph_clone_failed", { message: failure.message });
      throw failure;
    }
    if (!copy) {
      const failure = new StructuralCopyError("copy primitive returned no graph");
      this.logger?.error("graph_clone_failed", { message: failure.message });
      throw failure;
    }
    this.logger?.debug("graph_clone_completed", {
      vertices: copy.nodes().size,
      edges: copy.edges().size,
    });
    return new ImmutableValueGraphAdapter(copy, this.converter, {
      logger: this.logger,
      structuralCopy: this.structuralCopy,
    });
  }

  /** Writes this adapter to `writer` following the graph stream layout. */
  writeTo(writer: BinaryWriter, codecs: GraphStreamCodecs<N, W>): void {
    writeGraphStream(
      writer,
      {
        converter: { kind: this.converter.kind, params: this.converter.params },
        type: this.getType(),
        graph: this.valueGraph,
      },
      codecs,
    );
    this.logger?.debug("graph_serialized", {
      vertices: this.valueGraph.nodes().size,
      edges: this.valueGraph.edges().size,
      bytes: writer.byteLength,
    });
  }

  /** Serializes the adapter into a standalone buffer. */
  serialize(codecs: GraphStreamCodecs<N, W>): Buffer {
    const writer = new BinaryWriter();
    this.writeTo(writer, codecs);
    return writer.toBuffer();
  }

  /**
   * Rebuilds an adapter from bytes produced by {@link serialize}. The graph is
   * reconstructed in a scratch mutable graph and frozen; no adapter is
   * returned when any part of the stream is rejected, trailing bytes included.
   */
  static deserialize<N, W>(bytes: Uint8Array, options: DeserializeOptions<N, W>): ImmutableValueGraphAdapter<N, W> {
    return ImmutableValueGraphAdapter.decode(new BinaryReader(bytes), options, true);
  }

  /**
   * Reads a graph written by {@link writeTo} from a caller-owned reader and
   * stops after its last edge, leaving any following fields to the caller.
   */
  static readFrom<N, W>(reader: BinaryReader, options: DeserializeOptions<N, W>): ImmutableValueGraphAdapter<N, W> {
    return ImmutableValueGraphAdapter.decode(reader, options, false);
  }

  private static decode<N, W>(
    reader: BinaryReader,
    options: DeserializeOptions<N, W>,
    standalone: boolean,
  ): ImmutableValueGraphAdapter<N, W> {
    const limits = options.limits ?? loadAdapterConfig().codec;
    const converters = options.converters ?? WeightConverterRegistry.withBuiltins();
    try {
      const decoded = readGraphStream(reader, options, limits, options.nodeKey);
      if (standalone) {
        assertStreamConsumed(reader);
      }
      const converter = converters.resolve<W>(decoded.converter);
      const adapter = new ImmutableValueGraphAdapter(decoded.graph, converter, options);
      options.logger?.debug("graph_deserialized", {
        vertices: decoded.graph.nodes().size,
        edges: decoded.graph.edges().size,
        converter: decoded.converter.kind,
      });
      return adapter;
    } catch (error) {
      if (error instanceof GraphAdapterError) {
        options.logger?.warn("graph_deserialize_rejected", { code: error.code, message: error.message });
      }
      throw error;
    }
  }
}
