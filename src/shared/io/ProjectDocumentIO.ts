/**
 * ProjectDocumentIO - YAML codec for project documents
 *
 * One project (its devices with their interfaces and VLANs, links and
 * configuration snapshots) is stored as one YAML document. VLAN lists are
 * written as flow sequences of integers.
 */

import * as YAML from "yaml";

import projectSchema from "../../../schema/project.schema.json";
import { StorageError } from "../errors";
import type { ProjectDocument } from "../types/topology";
import { collectSchemaErrors, compileSchema } from "../utilities/schemaValidation";

import type { FileSystemAdapter, IOLogger, SaveResult } from "./types";
import { ERROR_DOCUMENT_NOT_MAP, noopLogger } from "./types";

const validateProjectDocument = compileSchema<ProjectDocument>(projectSchema);

/** File name suffix of project documents. */
export const PROJECT_FILE_SUFFIX = ".netval.yml";

/**
 * Parse and validate a project document. Schema defaults fill missing
 * optional fields (vendor, mode, state, ...). A document that is not a map or
 * fails the schema raises StorageError.
 */
export function parseProjectDocument(content: string): ProjectDocument {
  const parsed: unknown = YAML.parse(content);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new StorageError(ERROR_DOCUMENT_NOT_MAP);
  }
  if (!validateProjectDocument(parsed)) {
    throw new StorageError("Invalid project document", collectSchemaErrors(validateProjectDocument.errors));
  }
  return parsed;
}

/**
 * Stringify a project document. Sequences of scalars (VLAN lists) use flow
 * style; undefined fields are left out.
 */
export function stringifyProjectDocument(document: ProjectDocument): string {
  const doc = new YAML.Document(document);
  YAML.visit(doc, {
    Seq(_key, node) {
      if (node.items.length > 0 && node.items.every((item) => YAML.isScalar(item))) {
        node.flow = true;
      }
    }
  });
  return doc.toString();
}

/**
 * Options for writing project files
 */
export interface ProjectWriteOptions {
  fs: FileSystemAdapter;
  logger?: IOLogger;
}

/**
 * Write a project document, skipping the write when the content is unchanged.
 */
export async function writeProjectFile(
  document: ProjectDocument,
  filePath: string,
  options: ProjectWriteOptions
): Promise<SaveResult> {
  const { fs, logger = noopLogger } = options;
  const newContent = stringifyProjectDocument(document);

  if (await fs.exists(filePath)) {
    const existingContent = await fs.readFile(filePath);
    if (existingContent === newContent) {
      logger.debug(`No changes detected, skipping write of ${filePath}`);
      return { written: false };
    }
  }

  await fs.writeFile(filePath, newContent);
  logger.info(`Saved project document to ${filePath}`);
  return { written: true };
}
