import { z } from "zod";
import { defineDataType } from "../jobstore/backend.js";

/** Links a source folder id to the Drive folder created for it. */
export const DriveFolderMappingSchema = z.object({
  oldId: z.string(),
  newId: z.string().min(1),
});

export type DriveFolderMapping = z.infer<typeof DriveFolderMappingSchema>;

export const DRIVE_FOLDER_MAPPING = defineDataType(
  "drive_folder_mapping",
  DriveFolderMappingSchema,
);
