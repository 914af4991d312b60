import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "pino";
import { FeatureTransformer, parseNormalizationParameters } from "../../domain/feature-transformer.js";
import { ModelUnavailableError } from "../../infra/app-error.js";
import { LstmSequenceScorer, parseLstmNetwork } from "./lstm-sequence-scorer.js";
import { TreeEnsembleScorer, parseTreeEnsemble } from "./tree-ensemble-scorer.js";

export const ARTIFACT_FILES = {
  normalization: "normalization.json",
  staticModel: "static-model.json",
  sequentialModel: "sequential-model.json",
  checksums: "checksums.json",
} as const;

export interface LoadModelArtifactsOptions {
  windowSize: number;
  verifyChecksums: boolean;
  logger?: Logger;
}

export interface ModelArtifacts {
  transformer: FeatureTransformer;
  staticScorer: TreeEnsembleScorer;
  sequentialScorer: LstmSequenceScorer;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function sha256Hex(contents: Buffer | string): string {
  return createHash("sha256").update(contents).digest("hex");
}

async function readArtifact(directory: string, fileName: string): Promise<Buffer> {
  try {
    return await readFile(join(directory, fileName));
  } catch (error) {
    throw new ModelUnavailableError(`Cannot read model artifact '${fileName}': ${describe(error)}`);
  }
}

function parseJson(contents: Buffer, fileName: string): unknown {
  try {
    return JSON.parse(contents.toString("utf8"));
  } catch (error) {
    throw new ModelUnavailableError(`Model artifact '${fileName}' is not valid JSON: ${describe(error)}`);
  }
}

function parseChecksums(raw: unknown): Map<string, string> {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    throw new ModelUnavailableError("checksums.json must map file names to sha256 digests.");
  }
  const checksums = new Map<string, string>();
  for (const [fileName, digest] of Object.entries(raw)) {
    if (typeof digest !== "string" || !/^[0-9a-fA-F]{64}$/.test(digest)) {
      throw new ModelUnavailableError(`checksums.json entry '${fileName}' is not a sha256 digest.`);
    }
    checksums.set(fileName, digest.toLowerCase());
  }
  return checksums;
}

/**
 * Loads normalization parameters and both models once at startup. Every
 * failure, including a checksum mismatch or models that disagree on the
 * feature layout, is a ModelUnavailableError: the engine does not start
 * with partial models.
 */
export async function loadModelArtifacts(
  directory: string,
  options: LoadModelArtifactsOptions,
): Promise<ModelArtifacts> {
  const fileNames = [ARTIFACT_FILES.normalization, ARTIFACT_FILES.staticModel, ARTIFACT_FILES.sequentialModel];
  const contents = await Promise.all(fileNames.map((fileName) => readArtifact(directory, fileName)));

  if (options.verifyChecksums) {
    const checksums = parseChecksums(
      parseJson(await readArtifact(directory, ARTIFACT_FILES.checksums), ARTIFACT_FILES.checksums),
    );
    fileNames.forEach((fileName, index) => {
      const expected = checksums.get(fileName);
      const buffer = contents[index];
      if (!expected) {
        throw new ModelUnavailableError(`checksums.json has no entry for '${fileName}'.`);
      }
      if (!buffer || sha256Hex(buffer) !== expected) {
        throw new ModelUnavailableError(`Model artifact '${fileName}' failed checksum verification.`);
      }
    });
  }

  const [normalizationRaw, staticRaw, sequentialRaw] = fileNames.map((fileName, index) => {
    const buffer = contents[index];
    if (!buffer) {
      throw new ModelUnavailableError(`Model artifact '${fileName}' could not be read.`);
    }
    return parseJson(buffer, fileName);
  });

  const transformer = new FeatureTransformer(parseNormalizationParameters(normalizationRaw));
  const staticScorer = new TreeEnsembleScorer(parseTreeEnsemble(staticRaw));
  const sequentialScorer = new LstmSequenceScorer(parseLstmNetwork(sequentialRaw));

  if (staticScorer.featureCount !== transformer.dimension) {
    throw new ModelUnavailableError(
      `Static model expects ${staticScorer.featureCount} features but normalization produces ${transformer.dimension}.`,
    );
  }
  if (sequentialScorer.inputSize !== transformer.dimension) {
    throw new ModelUnavailableError(
      `Sequential model expects ${sequentialScorer.inputSize} features but normalization produces ${transformer.dimension}.`,
    );
  }
  if (sequentialScorer.windowSize !== options.windowSize) {
    throw new ModelUnavailableError(
      `Sequential model was exported for a window of ${sequentialScorer.windowSize}, configured window is ${options.windowSize}.`,
    );
  }

  options.logger?.info(
    {
      directory,
      features: transformer.dimension,
      windowSize: sequentialScorer.windowSize,
      checksumsVerified: options.verifyChecksums,
    },
    "Model artifacts loaded",
  );
  return { transformer, staticScorer, sequentialScorer };
}
