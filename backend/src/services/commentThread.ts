import { CommentNode, DocumentComment, ThreadEntry } from '../types';

const byCreation = (a: DocumentComment, b: DocumentComment): number =>
  a.createdAt === b.createdAt ? a.id.localeCompare(b.id) : a.createdAt.localeCompare(b.createdAt);

function groupByParent(comments: readonly DocumentComment[]): { roots: DocumentComment[]; children: Map<string, DocumentComment[]> } {
  const ids = new Set(comments.map(comment => comment.id));
  const children = new Map<string, DocumentComment[]>();
  const roots: DocumentComment[] = [];

  for (const comment of [...comments].sort(byCreation)) {
    // A reply whose parent is not in the set is shown at the top level
    if (comment.parentId && ids.has(comment.parentId)) {
      const siblings = children.get(comment.parentId) ?? [];
      siblings.push(comment);
      children.set(comment.parentId, siblings);
    } else {
      roots.push(comment);
    }
  }

  return { roots, children };
}

/**
 * Lazy depth-first walk over a flat comment list. Each call to
 * `[Symbol.iterator]` starts a fresh walk, and an explicit stack keeps
 * arbitrarily deep threads off the call stack.
 */
export function threadEntries(comments: readonly DocumentComment[]): Iterable<ThreadEntry> {
  return {
    *[Symbol.iterator]() {
      const { roots, children } = groupByParent(comments);
      const stack: ThreadEntry[] = roots.map(comment => ({ comment, depth: 0 })).reverse();
      const seen = new Set<string>();

      while (stack.length > 0) {
        const entry = stack.pop();
        if (!entry || seen.has(entry.comment.id)) continue;
        seen.add(entry.comment.id);
        yield entry;

        const replies = children.get(entry.comment.id) ?? [];
        for (let i = replies.length - 1; i >= 0; i--) {
          stack.push({ comment: replies[i], depth: entry.depth + 1 });
        }
      }
    }
  };
}

// Nests the flat list into {comment, children} nodes without recursion
export function buildCommentTree(comments: readonly DocumentComment[]): CommentNode[] {
  const roots: CommentNode[] = [];
  const path: CommentNode[] = [];

  for (const { comment, depth } of threadEntries(comments)) {
    const node: CommentNode = { comment, children: [] };
    path.length = depth;
    if (depth === 0) {
      roots.push(node);
    } else {
      path[depth - 1].children.push(node);
    }
    path.push(node);
  }

  return roots;
}
