/**
 * Sidecar record schemas
 *
 * The sidecar is the on-disk contract shared with other tools (faces, tags,
 * thumbnails, verify, migrate), so its keys stay snake_case and the schemas
 * below are the single source of truth for both parsing and typing.
 */

import { z } from "zod";

export const PipelineSignatureSchema = z.object({
  schema_version: z.string().min(1),
  producer_version: z.string().min(1),
  hash_algorithm: z.string().min(1),
  face_model: z.string().optional(),
  tag_model: z.string().optional(),
  created_at: z.string().datetime({ offset: true }),
});

export const SourceInfoSchema = z.object({
  file_path: z.string().min(1),
  file_size_bytes: z.number().int().nonnegative(),
  file_hash: z.string().regex(/^[0-9a-f]+$/, "must be lowercase hex"),
  file_modified_at: z.string().datetime({ offset: true }),
});

export const ImageInfoSchema = z.object({
  width: z.number().int().positive().optional(),
  height: z.number().int().positive().optional(),
  format: z.string().optional(),
  orientation: z.number().int().min(1).max(8).optional(),
  datetime_original: z.string().optional(),
  camera_make: z.string().optional(),
  camera_model: z.string().optional(),
  gps_latitude: z.number().min(-90).max(90).optional(),
  gps_longitude: z.number().min(-180).max(180).optional(),
});

export const FaceDetectionSchema = z.object({
  bbox: z.tuple([z.number(), z.number(), z.number(), z.number()]),
  score: z.number().min(0).max(1),
  embedding_hash: z.string().optional(),
  person: z.string().optional(),
});

export const TagSourceSchema = z.enum(["ml", "rules", "user"]);

export const TagSchema = z.object({
  label: z.string().min(1),
  score: z.number().min(0).max(1).optional(),
  source: TagSourceSchema,
});

export const ThumbnailInfoSchema = z.object({
  path: z.string().min(1),
  size: z.number().int().positive(),
  format: z.string().min(1),
});

export const SidecarSchema = z.object({
  schema_version: z.string().min(1),
  producer_version: z.string().min(1),
  created_at: z.string().datetime({ offset: true }),
  updated_at: z.string().datetime({ offset: true }),
  pipeline_signature: PipelineSignatureSchema,
  source: SourceInfoSchema,
  image: ImageInfoSchema.optional(),
  faces: z.array(FaceDetectionSchema).default([]),
  tags: z.array(TagSchema).default([]),
  thumbnails: z.array(ThumbnailInfoSchema).default([]),
});

export type PipelineSignature = z.infer<typeof PipelineSignatureSchema>;
export type SourceInfo = z.infer<typeof SourceInfoSchema>;
export type ImageInfo = z.infer<typeof ImageInfoSchema>;
export type FaceDetection = z.infer<typeof FaceDetectionSchema>;
export type TagSource = z.infer<typeof TagSourceSchema>;
export type Tag = z.infer<typeof TagSchema>;
export type ThumbnailInfo = z.infer<typeof ThumbnailInfoSchema>;
export type Sidecar = z.infer<typeof SidecarSchema>;
