/**
 * JSON投影のスキーマとアリーナへの変換
 */

import { z } from 'zod';
import type { DocumentIndexJson, SectionNodeJson } from '@docnav/types';
import { InvalidProjectionError } from '../errors.js';
import type { SectionArena, SectionRecord } from './arena.js';

/** 正の整数をドットで連結した識別子（例: "2.3.1"） */
export const IDENTIFIER_PATTERN = /^[1-9]\d*(?:\.[1-9]\d*)*$/;

export const sectionNodeSchema: z.ZodType<SectionNodeJson> = z.lazy(() =>
  z.object({
    identifier: z.string().regex(IDENTIFIER_PATTERN, 'identifier must be dot-separated positive integers'),
    title: z.string(),
    depth: z.number().int().min(1),
    bodyText: z.string(),
    children: z.array(sectionNodeSchema),
  })
);

export const documentIndexSchema: z.ZodType<DocumentIndexJson> = z.object({
  documentId: z.string().min(1),
  title: z.string().optional(),
  nodes: z.array(sectionNodeSchema),
});

/**
 * 未検証の値をJSON投影として解析
 */
export function parseProjection(value: unknown): DocumentIndexJson {
  const result = documentIndexSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const location = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new InvalidProjectionError(`Invalid index projection${location}: ${issue?.message ?? 'unknown error'}`);
  }
  return result.data;
}

/**
 * ネストしたJSON投影をフラットなアリーナに変換
 * 識別子の整合性チェックはDocumentIndex側で行う
 */
export function projectionToArena(projection: DocumentIndexJson): SectionArena {
  const nodes: SectionRecord[] = [];

  const append = (node: SectionNodeJson): number => {
    const index = nodes.length;
    const children: number[] = [];
    nodes.push({
      identifier: node.identifier,
      title: node.title,
      depth: node.depth,
      bodyText: node.bodyText,
      children,
    });
    for (const child of node.children) {
      children.push(append(child));
    }
    return index;
  };

  const roots = projection.nodes.map((node) => append(node));
  return { nodes, roots };
}
