/**
 * Troubleshooting Engine
 *
 * Compiled decision graphs, stateless navigation tokens and in-place
 * message rendering for button-driven diagnostics.
 */

export * from "./types";
export * from "./errors";

export { compileDiagram, compileDiagramCached, getNode, getOutgoingEdges, DEFAULT_EDGE_LABEL } from "./diagram-compiler";
export type { CompileOptions } from "./diagram-compiler";

export { encodeToken, encodeTokenWithHistory, decodeToken, graphKeyTag } from "./navigation-codec";
export type { TokenResolver, ResolvedGraph } from "./navigation-codec";

export { encodeAction, parseAction } from "./action-payload";
export type { ActionPayload } from "./action-payload";

export { HistoryStack } from "./history-stack";
export { buildButtonGrid, truncateLabel, ACTION_LABELS } from "./button-layout";
export { formatNodeText, formatSafetyBlock, CAPTION_LIMIT } from "./formatting";

export {
  Navigator,
  startState,
  selectTransition,
  selectByLabel,
  backTransition,
  restartTransition,
  renderState,
  NOTICES,
} from "./navigator";
export type { GraphSource, NavigationAction, NavigatorOptions } from "./navigator";

export { GraphRegistry, getGraphRegistry } from "./graph-registry";
export type { GraphVersionRecord, PublishResult } from "./graph-registry";

export { SessionQueue } from "./session-queue";
export { TroubleshootingService, getTroubleshootingService } from "./service";
export type { ActionReply, QueryReply, StartReply } from "./service";
