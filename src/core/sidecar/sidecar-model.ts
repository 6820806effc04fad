/**
 * Sidecar Model
 * Builds sidecar records and their pipeline signatures
 */

import type { PipelineSignature, Sidecar, SourceInfo } from "../../interfaces/sidecar.js";
import { HASH_ALGORITHM } from "../../utils/fs-utils.js";
import { VERSION } from "../../version.js";

export const SCHEMA_VERSION = "1.0.0";

export interface SignatureOptions {
  producerVersion?: string;
  faceModel?: string;
  tagModel?: string;
}

export const createPipelineSignature = (
  createdAt: string,
  options: SignatureOptions = {}
): PipelineSignature => {
  const signature: PipelineSignature = {
    schema_version: SCHEMA_VERSION,
    producer_version: options.producerVersion ?? VERSION,
    hash_algorithm: HASH_ALGORITHM,
    created_at: createdAt,
  };
  if (options.faceModel !== undefined) {
    signature.face_model = options.faceModel;
  }
  if (options.tagModel !== undefined) {
    signature.tag_model = options.tagModel;
  }
  return signature;
};

/**
 * Two signatures are compatible when schema and hash algorithm agree.
 * Producer and model identifiers may differ.
 */
export const isCompatible = (a: PipelineSignature, b: PipelineSignature): boolean =>
  a.schema_version === b.schema_version && a.hash_algorithm === b.hash_algorithm;

/**
 * Fresh sidecar for a just-scanned file: no image block, empty collections,
 * created_at === updated_at
 */
export const buildSidecar = (
  source: SourceInfo,
  now: string,
  options: SignatureOptions = {}
): Sidecar => {
  const signature = createPipelineSignature(now, options);
  return {
    schema_version: signature.schema_version,
    producer_version: signature.producer_version,
    created_at: now,
    updated_at: now,
    pipeline_signature: signature,
    source,
    faces: [],
    tags: [],
    thumbnails: [],
  };
};

/**
 * Key order for serialization follows the record layout so files diff cleanly
 */
export const serializeSidecar = (sidecar: Sidecar): string => {
  const ordered = {
    schema_version: sidecar.schema_version,
    producer_version: sidecar.producer_version,
    created_at: sidecar.created_at,
    updated_at: sidecar.updated_at,
    pipeline_signature: {
      schema_version: sidecar.pipeline_signature.schema_version,
      producer_version: sidecar.pipeline_signature.producer_version,
      hash_algorithm: sidecar.pipeline_signature.hash_algorithm,
      face_model: sidecar.pipeline_signature.face_model,
      tag_model: sidecar.pipeline_signature.tag_model,
      created_at: sidecar.pipeline_signature.created_at,
    },
    source: {
      file_path: sidecar.source.file_path,
      file_size_bytes: sidecar.source.file_size_bytes,
      file_hash: sidecar.source.file_hash,
      file_modified_at: sidecar.source.file_modified_at,
    },
    image: sidecar.image,
    faces: sidecar.faces,
    tags: sidecar.tags,
    thumbnails: sidecar.thumbnails,
  };
  // undefined members are dropped by JSON.stringify
  return JSON.stringify(ordered, null, 2);
};
