import { z } from 'zod';

const U64_MAX = 18446744073709551615n;

// Absent and null both decode to undefined
function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value): z.output<T> | undefined => value ?? undefined);
}

/**
 * Unsigned 64-bit integer. Accepts the digit string produced by
 * `preserveIntegers` as well as a plain JSON number.
 */
export const UInt64Schema = z
  .union([
    z.string().regex(/^\d+$/, 'Expected an unsigned integer'),
    z.number().int().nonnegative(),
  ])
  .transform((value) => BigInt(value))
  .pipe(z.bigint().max(U64_MAX, 'Exceeds the unsigned 64-bit range'));

// Dropbox timestamps: ISO 8601, `2015-05-12T15:50:38Z`
export const TimestampSchema = z
  .string()
  .datetime({ offset: true, message: 'Expected an ISO 8601 timestamp' });

export const DimensionsSchema = z
  .object({
    height: z.number().int().nonnegative(),
    width: z.number().int().nonnegative(),
  });

export type Dimensions = z.infer<typeof DimensionsSchema>;

export const GpsCoordinatesSchema = z
  .object({
    latitude: z.number(),
    longitude: z.number(),
  });

export type GpsCoordinates = z.infer<typeof GpsCoordinatesSchema>;

const PhotoMetadataSchema = z
  .object({
    '.tag': z.literal('photo'),
    dimensions: optional(DimensionsSchema),
    location: optional(GpsCoordinatesSchema),
    time_taken: optional(TimestampSchema),
  })
  .transform((raw) => ({
    tag: 'photo' as const,
    dimensions: raw.dimensions,
    location: raw.location,
    timeTaken: raw.time_taken,
  }));

export type PhotoMetadata = z.infer<typeof PhotoMetadataSchema>;

const VideoMetadataSchema = z
  .object({
    '.tag': z.literal('video'),
    dimensions: optional(DimensionsSchema),
    location: optional(GpsCoordinatesSchema),
    time_taken: optional(TimestampSchema),
    duration: optional(UInt64Schema),
  })
  .transform((raw) => ({
    tag: 'video' as const,
    dimensions: raw.dimensions,
    location: raw.location,
    timeTaken: raw.time_taken,
    duration: raw.duration,
  }));

export type VideoMetadata = z.infer<typeof VideoMetadataSchema>;

export const MediaMetadataSchema = z.union([PhotoMetadataSchema, VideoMetadataSchema]);

export type MediaMetadata = z.infer<typeof MediaMetadataSchema>;

export const MediaInfoSchema = z.union([
  z
    .object({ '.tag': z.literal('pending') })
    .transform(() => ({ tag: 'pending' as const })),
  z
    .object({ '.tag': z.literal('metadata'), metadata: MediaMetadataSchema })
    .transform((raw) => ({ tag: 'metadata' as const, metadata: raw.metadata })),
]);

export type MediaInfo = z.infer<typeof MediaInfoSchema>;

export const FileSharingInfoSchema = z
  .object({
    read_only: z.boolean(),
    parent_shared_folder_id: z.string(),
    modified_by: optional(z.string()),
  })
  .transform((raw) => ({
    readOnly: raw.read_only,
    parentSharedFolderId: raw.parent_shared_folder_id,
    modifiedBy: raw.modified_by,
  }));

export type FileSharingInfo = z.infer<typeof FileSharingInfoSchema>;

export const PropertyFieldSchema = z.object({
  name: z.string(),
  value: z.string(),
});

export type PropertyField = z.infer<typeof PropertyFieldSchema>;

export const PropertyGroupSchema = z
  .object({
    template_id: z.string(),
    fields: z.array(PropertyFieldSchema),
  })
  .transform((raw) => ({
    templateId: raw.template_id,
    fields: raw.fields,
  }));

export type PropertyGroup = z.infer<typeof PropertyGroupSchema>;

// files/upload result (FileMetadata)
export const UploadResponseSchema = z
  .object({
    name: z.string(),
    id: z.string(),
    client_modified: TimestampSchema,
    server_modified: TimestampSchema,
    rev: z.string(),
    size: UInt64Schema,
    path_lower: optional(z.string()),
    path_display: optional(z.string()),
    parent_shared_folder_id: optional(z.string()),
    media_info: optional(MediaInfoSchema),
    sharing_info: optional(FileSharingInfoSchema),
    property_groups: optional(z.array(PropertyGroupSchema)),
    has_explicit_shared_members: optional(z.boolean()),
    content_hash: optional(z.string()),
  })
  .transform((raw) => ({
    name: raw.name,
    id: raw.id,
    clientModified: raw.client_modified,
    serverModified: raw.server_modified,
    rev: raw.rev,
    size: raw.size,
    pathLower: raw.path_lower,
    pathDisplay: raw.path_display,
    parentSharedFolderId: raw.parent_shared_folder_id,
    mediaInfo: raw.media_info,
    sharingInfo: raw.sharing_info,
    propertyGroups: raw.property_groups,
    hasExplicitSharedMembers: raw.has_explicit_shared_members,
    contentHash: raw.content_hash,
  }));

export type UploadResponse = z.infer<typeof UploadResponseSchema>;

// Error body shape Dropbox returns with 4xx/5xx statuses
export const ApiErrorBodySchema = z.object({
  error_summary: z.string(),
});
