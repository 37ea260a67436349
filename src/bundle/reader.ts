/**
 * Export bundle reader.
 *
 * A bundle is a zip holding `manifest.json` (the root container of the
 * exported tree) and one `content/<ref>` entry per cached document body.
 */
import { strFromU8, unzipSync } from "fflate";
import { readFile } from "node:fs/promises";
import { posix } from "node:path";
import { z } from "zod";
import { ExportBundleError } from "../core/exceptions.js";
import { isRootResource, type ContainerResource } from "../core/types.js";

const MANIFEST_PATH = "manifest.json";
const CONTENT_PREFIX = "content/";

// ---------------------------------------------------------------------------
// Manifest schema
// ---------------------------------------------------------------------------

const DigitalDocumentSchema = z.object({
  name: z.string().min(1),
  dateModified: z.string().nullish(),
  encodingFormat: z.string().nullish(),
});

const DocumentWrapperSchema = z.object({
  cachedContentId: z.string().min(1),
  originalEncodingFormat: z.string().nullish(),
  document: DigitalDocumentSchema,
});

export const ContainerResourceSchema: z.ZodType<ContainerResource, z.ZodTypeDef, unknown> =
  z.lazy(() =>
    z.object({
      id: z.string().default(""),
      name: z.string().default(""),
      folders: z.array(ContainerResourceSchema).default([]),
      files: z.array(DocumentWrapperSchema).default([]),
    }),
  );

/**
 * The top-level node may be the root (empty or "root" id). Every nested
 * folder needs its own id: the importer resolves a folder's Drive parent
 * through that id.
 */
export const ManifestSchema = ContainerResourceSchema.superRefine((root, ctx) => {
  const seen = new Set<string>();
  if (root.id) seen.add(root.id);
  const visit = (node: ContainerResource, path: string): void => {
    for (const child of node.folders) {
      const childPath = `${path}/${child.name}`;
      if (isRootResource(child)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: child.id
            ? `nested folder ${childPath} uses the reserved id ${child.id}`
            : `nested folder ${childPath} has no id`,
        });
      } else if (seen.has(child.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `folder id ${child.id} is used more than once (${childPath})`,
        });
      } else {
        seen.add(child.id);
      }
      visit(child, childPath);
    }
  };
  visit(root, "");
});

export interface ExportBundle {
  root: ContainerResource;
  /** Content blobs keyed by cachedContentId. */
  content: Map<string, Uint8Array>;
}

// ---------------------------------------------------------------------------
// Reading
// ---------------------------------------------------------------------------

export async function readExportBundle(zipPath: string): Promise<ExportBundle> {
  const data = await readFile(zipPath);
  return parseExportBundle(new Uint8Array(data));
}

export function parseExportBundle(zip: Uint8Array): ExportBundle {
  let entries: Record<string, Uint8Array>;
  try {
    entries = unzipSync(zip);
  } catch (err) {
    throw new ExportBundleError(`cannot unzip: ${String(err)}`, { cause: err });
  }

  const manifest = entries[MANIFEST_PATH];
  if (!manifest) {
    throw new ExportBundleError(`missing ${MANIFEST_PATH}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(strFromU8(manifest));
  } catch (err) {
    throw new ExportBundleError(`${MANIFEST_PATH} is not valid JSON`, { cause: err });
  }
  const parsed = ManifestSchema.safeParse(json);
  if (!parsed.success) {
    throw new ExportBundleError(`${MANIFEST_PATH}: ${parsed.error.message}`);
  }

  const content = new Map<string, Uint8Array>();
  for (const [name, bytes] of Object.entries(entries)) {
    // Skip directories (empty data with trailing /)
    if (name.endsWith("/") && bytes.length === 0) continue;
    const normalised = posix.normalize(name);
    if (!normalised.startsWith(CONTENT_PREFIX)) continue;
    content.set(normalised.slice(CONTENT_PREFIX.length), bytes);
  }

  for (const ref of contentRefs(parsed.data)) {
    if (!content.has(ref)) {
      throw new ExportBundleError(`no content for ${ref}`);
    }
  }

  return { root: parsed.data, content };
}

/** Every cachedContentId referenced anywhere in the tree. */
export function contentRefs(root: ContainerResource): string[] {
  const refs: string[] = [];
  const visit = (node: ContainerResource): void => {
    for (const file of node.files) refs.push(file.cachedContentId);
    for (const child of node.folders) visit(child);
  };
  visit(root);
  return refs;
}

// ---------------------------------------------------------------------------
// Staging
// ---------------------------------------------------------------------------

export interface ContentSink {
  putContent(jobId: string, contentRef: string, data: Uint8Array): Promise<void>;
}

/** Copy a bundle's content blobs into the job store. Returns the blob count. */
export async function stageExportBundle(
  sink: ContentSink,
  jobId: string,
  bundle: ExportBundle,
): Promise<number> {
  for (const [ref, bytes] of bundle.content) {
    await sink.putContent(jobId, ref, bytes);
  }
  return bundle.content.size;
}
