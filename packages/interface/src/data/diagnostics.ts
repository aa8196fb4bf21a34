import { logger } from "../logger";
import { formatDataNode, type DataNode } from "./data-node";

/**
 * Reports a configuration problem on the given line. Loading always continues.
 */
export const traceNode = (node: DataNode, message: string, detail?: string): void => {
  logger.warn(
    {
      line: formatDataNode(node),
      location: node.location,
      ...(detail === undefined ? {} : { token: detail }),
    },
    message,
  );
};
