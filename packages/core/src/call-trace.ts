import type { AddressDirectory } from "./address-directory.js";
import type { SelectorResolver } from "./selector-resolver.js";
import type { CallTraceNode, ContractType, DisplayMode } from "./types.js";
import { tryDecodeHex, hexDigits, padVisible, defaultColors, type Colors } from "./format.js";

const INDENT_PER_LEVEL = 2;
const LABEL_WIDTH = 52;
const SIGNATURE_WIDTH = 16;

export interface RenderContext {
  directory: AddressDirectory;
  resolver: SelectorResolver;
  /** When false, the resolver is never consulted. */
  resolveHashes: boolean;
  colors?: Colors;
}

export interface CallTreeOptions extends RenderContext {
  mode: DisplayMode;
}

/** Whether a call into a contract of `contractType` is printed under `mode`. */
export function shouldShowCall(contractType: ContractType, mode: DisplayMode): boolean {
  switch (mode) {
    case "all":
      return true;
    case "none":
      return false;
    case "user":
      return contractType === "unknown" || contractType === "popular";
    case "system":
      return contractType !== "precompile";
  }
}

async function formatSignature(
  rawInput: string,
  contractType: ContractType,
  ctx: RenderContext
): Promise<string> {
  const input = tryDecodeHex(rawInput);
  // Not hex: shown verbatim
  if (!input) return rawInput;
  if (input.length < 4) {
    return "0x" + hexDigits(input);
  }

  const selector = hexDigits(input.subarray(0, 4));
  const raw = selector.padStart(SIGNATURE_WIDTH);
  if (!ctx.resolveHashes || contractType === "precompile") {
    return raw;
  }
  return (await ctx.resolver.resolveFunctionSelector(selector)) ?? raw;
}

/** Render a single call (without its children) at the given depth. */
export async function renderCall(
  node: CallTraceNode,
  depth: number,
  ctx: RenderContext
): Promise<string> {
  const colors = ctx.colors ?? defaultColors;
  const contractType = ctx.directory.classify(node.to);

  const label = ctx.directory.knownName(node.to, colors) ?? colors.bold(node.to);
  const signature = await formatSignature(node.input, contractType, ctx);

  const fields = [
    padVisible(label, LABEL_WIDTH),
    signature,
    node.revertReason !== undefined ? `Revert: ${node.revertReason}` : "",
    node.error !== undefined ? `Error: ${node.error}` : "",
    node.gasUsed.toString(),
  ].filter((field) => field !== "");

  const line = " ".repeat(depth * INDENT_PER_LEVEL) + node.type + " " + fields.join(" ");
  const failed = node.revertReason !== undefined || node.error !== undefined;
  return failed ? colors.bgRed(line) : line;
}

/**
 * Render a call tree, one line per visible call. Every node is visited in
 * pre-order; visibility is decided per node, and hidden calls still deepen
 * the indentation of their descendants.
 */
export async function renderCallTree(
  root: CallTraceNode,
  options: CallTreeOptions
): Promise<string[]> {
  const lines: string[] = [];

  async function visit(node: CallTraceNode, depth: number): Promise<void> {
    const contractType = options.directory.classify(node.to);
    if (shouldShowCall(contractType, options.mode)) {
      lines.push(await renderCall(node, depth, options));
    }
    for (const child of node.children) {
      await visit(child, depth + 1);
    }
  }

  await visit(root, 0);
  return lines;
}
