import type { FeatureVector } from "../../domain/types.js";
import type { StaticAttribution, StaticScorerPort } from "../../ports/risk-scorer.js";
import { AppError, ModelUnavailableError } from "../../infra/app-error.js";
import { isObject } from "../../infra/guards.js";
import { sigmoid } from "./activation.js";

interface SplitNode {
  kind: "split";
  feature: number;
  threshold: number;
  left: number;
  right: number;
  missing: number;
  cover: number;
}

interface LeafNode {
  kind: "leaf";
  value: number;
  cover: number;
}

type TreeNode = SplitNode | LeafNode;

interface Tree {
  nodes: Map<number, TreeNode>;
  /** Cover-weighted mean leaf value below each node. */
  expected: Map<number, number>;
}

export interface TreeEnsembleModel {
  baseScore: number;
  featureCount: number;
  trees: Tree[];
}

const ROOT_ID = 0;
const MAX_DEPTH = 64;

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isNodeId(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function invalidModel(detail: string): ModelUnavailableError {
  return new ModelUnavailableError(`Static model artifact is invalid: ${detail}.`);
}

function parseNode(raw: unknown, featureCount: number, where: string): [number, TreeNode] {
  if (!isObject(raw) || !isNodeId(raw.id)) {
    throw invalidModel(`${where} needs a non-negative integer id`);
  }
  const cover = raw.cover === undefined ? Number.NaN : raw.cover;
  if (raw.cover !== undefined && (!isFiniteNumber(cover) || cover < 0)) {
    throw invalidModel(`${where} cover must be a non-negative number`);
  }

  if (raw.leaf !== undefined) {
    if (!isFiniteNumber(raw.leaf)) {
      throw invalidModel(`${where} leaf must be a finite number`);
    }
    return [raw.id, { kind: "leaf", value: raw.leaf, cover: isFiniteNumber(cover) ? cover : 1 }];
  }

  const { feature, threshold, left, right } = raw;
  if (!isNodeId(feature) || feature >= featureCount) {
    throw invalidModel(`${where} feature index out of range`);
  }
  if (!isFiniteNumber(threshold) || !isNodeId(left) || !isNodeId(right)) {
    throw invalidModel(`${where} split needs threshold, left and right`);
  }
  const missing = raw.missing === undefined ? left : raw.missing;
  if (!isNodeId(missing)) {
    throw invalidModel(`${where} missing must be a node id`);
  }
  return [raw.id, { kind: "split", feature, threshold, left, right, missing, cover: isFiniteNumber(cover) ? cover : Number.NaN }];
}

function computeExpectations(nodes: Map<number, TreeNode>, treeIndex: number): Map<number, number> {
  const expected = new Map<number, number>();
  const resolvedCover = new Map<number, number>();

  const visit = (id: number, depth: number): void => {
    if (depth > MAX_DEPTH) {
      throw invalidModel(`tree ${treeIndex} is deeper than ${MAX_DEPTH} or cyclic`);
    }
    const node = nodes.get(id);
    if (!node) {
      throw invalidModel(`tree ${treeIndex} references missing node ${id}`);
    }
    if (node.kind === "leaf") {
      expected.set(id, node.value);
      resolvedCover.set(id, node.cover);
      return;
    }
    if (node.missing !== node.left && node.missing !== node.right) {
      throw invalidModel(`tree ${treeIndex} node ${id} missing branch must be left or right`);
    }
    visit(node.left, depth + 1);
    visit(node.right, depth + 1);
    const leftCover = resolvedCover.get(node.left) ?? 0;
    const rightCover = resolvedCover.get(node.right) ?? 0;
    const leftValue = expected.get(node.left) ?? 0;
    const rightValue = expected.get(node.right) ?? 0;
    const total = leftCover + rightCover;
    expected.set(id, total > 0 ? (leftCover * leftValue + rightCover * rightValue) / total : (leftValue + rightValue) / 2);
    resolvedCover.set(id, Number.isNaN(node.cover) ? total : node.cover);
  };

  visit(ROOT_ID, 0);
  return expected;
}

/**
 * Reads the JSON export of a gradient-boosted tree ensemble. Node ids are
 * per tree with the root at 0; a split sends `x < threshold` left and a
 * non-finite value down the `missing` branch.
 */
export function parseTreeEnsemble(raw: unknown): TreeEnsembleModel {
  if (!isObject(raw)) {
    throw invalidModel("expected an object");
  }
  const { base_score: baseScore, feature_count: featureCount, trees } = raw;
  if (!isFiniteNumber(baseScore)) {
    throw invalidModel("base_score must be a finite number");
  }
  if (!isNodeId(featureCount) || featureCount === 0) {
    throw invalidModel("feature_count must be a positive integer");
  }
  if (!Array.isArray(trees) || trees.length === 0) {
    throw invalidModel("trees must be a non-empty array");
  }

  const parsedTrees = trees.map((tree, treeIndex): Tree => {
    if (!isObject(tree) || !Array.isArray(tree.nodes) || tree.nodes.length === 0) {
      throw invalidModel(`tree ${treeIndex} needs a non-empty nodes array`);
    }
    const nodes = new Map<number, TreeNode>();
    tree.nodes.forEach((node, nodeIndex) => {
      const [id, parsed] = parseNode(node, featureCount, `tree ${treeIndex} node ${nodeIndex}`);
      if (nodes.has(id)) {
        throw invalidModel(`tree ${treeIndex} repeats node id ${id}`);
      }
      nodes.set(id, parsed);
    });
    return { nodes, expected: computeExpectations(nodes, treeIndex) };
  });

  return { baseScore, featureCount, trees: parsedTrees };
}

export class TreeEnsembleScorer implements StaticScorerPort {
  readonly featureCount: number;

  constructor(private readonly model: TreeEnsembleModel) {
    this.featureCount = model.featureCount;
  }

  score(vector: FeatureVector): number {
    return sigmoid(this.margin(vector));
  }

  /**
   * Path attribution: walking each tree from the root, the change in the
   * expected subtree value at every split is credited to the split feature.
   * Per tree the credits telescope to `leaf - expected(root)`, so across the
   * ensemble they sum to `output - baseline`.
   */
  attribute(vector: FeatureVector): StaticAttribution {
    this.assertDimension(vector);
    const contributions = new Array<number>(this.featureCount).fill(0);
    let baseline = this.model.baseScore;
    let output = this.model.baseScore;

    for (const tree of this.model.trees) {
      let nodeId = ROOT_ID;
      let node = this.nodeOf(tree, nodeId);
      let nodeExpected = tree.expected.get(nodeId) ?? 0;
      baseline += nodeExpected;
      while (node.kind === "split") {
        const childId = this.nextNode(node, vector);
        const childExpected = tree.expected.get(childId) ?? 0;
        contributions[node.feature] = (contributions[node.feature] ?? 0) + childExpected - nodeExpected;
        nodeId = childId;
        node = this.nodeOf(tree, nodeId);
        nodeExpected = childExpected;
      }
      output += node.value;
    }

    return { baseline, output, contributions };
  }

  private margin(vector: FeatureVector): number {
    this.assertDimension(vector);
    let margin = this.model.baseScore;
    for (const tree of this.model.trees) {
      let node = this.nodeOf(tree, ROOT_ID);
      while (node.kind === "split") {
        node = this.nodeOf(tree, this.nextNode(node, vector));
      }
      margin += node.value;
    }
    return margin;
  }

  private nextNode(node: SplitNode, vector: FeatureVector): number {
    const value = vector[node.feature];
    if (value === undefined || !Number.isFinite(value)) {
      return node.missing;
    }
    return value < node.threshold ? node.left : node.right;
  }

  private nodeOf(tree: Tree, id: number): TreeNode {
    const node = tree.nodes.get(id);
    if (!node) {
      throw new AppError(500, "model_inconsistent", `Tree node ${id} is missing.`);
    }
    return node;
  }

  private assertDimension(vector: FeatureVector): void {
    if (vector.length !== this.featureCount) {
      throw new AppError(
        500,
        "feature_dimension_mismatch",
        `Static model expects ${this.featureCount} features, got ${vector.length}.`,
      );
    }
  }
}
