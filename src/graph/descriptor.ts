import { z } from "zod";

import { NetworkDescriptorError } from "../errors.js";
import { NetworkModel } from "./model.js";

const NodeIdSchema = z
  .number()
  .int("node ids must be integers")
  .positive("node ids must be positive");

/**
 * Edge entry of a network descriptor. Weights only need to be finite here:
 * negative values are stored as-is and refused by the formulas that read them.
 */
const NetworkEdgeSchema = z.object({
  from: NodeIdSchema,
  to: NodeIdSchema,
  weight: z.number().finite("edge weights must be finite").default(1),
});

/** JSON payload describing a network. */
export const NetworkDescriptorSchema = z
  .object({
    name: z.string().trim().min(1).default("network"),
    directed: z.boolean().default(false),
    weighted: z.boolean().default(false),
    nodes: z.array(NodeIdSchema),
    edges: z.array(NetworkEdgeSchema).default([]),
  })
  .superRefine((descriptor, ctx) => {
    const declared = new Set<number>();
    descriptor.nodes.forEach((node, index) => {
      if (declared.has(node)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate node ${node}`,
          path: ["nodes", index],
        });
      }
      declared.add(node);
    });
    descriptor.edges.forEach((edge, index) => {
      for (const endpoint of ["from", "to"] as const) {
        if (!declared.has(edge[endpoint])) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `edge references undeclared node ${edge[endpoint]}`,
            path: ["edges", index, endpoint],
          });
        }
      }
    });
  });

export type NetworkDescriptorInput = z.input<typeof NetworkDescriptorSchema>;
export type NetworkDescriptor = z.output<typeof NetworkDescriptorSchema>;

/** Parses `payload` and builds the matching {@link NetworkModel}. */
export function loadNetwork(payload: unknown): NetworkModel {
  const parsed = NetworkDescriptorSchema.safeParse(payload);
  if (!parsed.success) {
    throw new NetworkDescriptorError(
      parsed.error.issues.map((issue) => ({
        path: `/${issue.path.join("/")}`,
        message: issue.message,
      })),
    );
  }
  return new NetworkModel(parsed.data);
}
