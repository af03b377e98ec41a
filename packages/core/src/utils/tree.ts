import { Node, NodeKind } from "../parser/types";

export const NODE_TAGS: Record<NodeKind, string> = {
    [NodeKind.Expression]: "EXPR",
    [NodeKind.BooleanExpression]: "BOOL",
    [NodeKind.DeclarationList]: "DECLS",
    [NodeKind.StatementList]: "STMTS",
    [NodeKind.Assignment]: "ASSIGN",
    [NodeKind.If]: "IF",
    [NodeKind.While]: "WHILE",
    [NodeKind.For]: "FOR",
    [NodeKind.Read]: "READ",
    [NodeKind.Write]: "WRITE",
    [NodeKind.Block]: "BLOCK",
    [NodeKind.Operator]: "OP",
    [NodeKind.Identifier]: "ID",
    [NodeKind.IntLiteral]: "NUM",
    [NodeKind.FloatLiteral]: "FLOAT",
    [NodeKind.BoolLiteral]: "BOOLVAL",
    [NodeKind.TypeName]: "TYPE",
    [NodeKind.List]: "LIST",
};

/**
 * Preorder depth-first walk. Uses an explicit stack, so deep trees (long
 * chains of unary operators) cannot overflow the call stack. Null children
 * are skipped.
 */
export function walkTree(
    root: Node,
    visit: (node: Node, depth: number) => void,
): void {
    const stack: Array<{ node: Node; depth: number }> = [
        { node: root, depth: 0 },
    ];

    for (let entry = stack.pop(); entry; entry = stack.pop()) {
        const { node, depth } = entry;
        visit(node, depth);

        const children = node.children;
        for (let i = children.length - 1; i >= 0; i--) {
            const child = children[i];
            if (child) stack.push({ node: child, depth: depth + 1 });
        }
    }
}

/**
 * One line per node: two spaces per level, the bracketed tag, then the
 * node's text when it has any.
 */
export function serializeTree(root: Node): string {
    let output = "";
    walkTree(root, (node, depth) => {
        const tag = `${"  ".repeat(depth)}[${NODE_TAGS[node.kind]}]`;
        output += node.text ? `${tag} ${node.text}\n` : `${tag}\n`;
    });
    return output;
}

export function findNodes<K extends NodeKind>(
    root: Node,
    kind: K,
): Extract<Node, { kind: K }>[] {
    const found: Extract<Node, { kind: K }>[] = [];
    walkTree(root, (node) => {
        if (isKind(node, kind)) found.push(node);
    });
    return found;
}

export function isKind<K extends NodeKind>(
    node: Node,
    kind: K,
): node is Extract<Node, { kind: K }> {
    return node.kind === kind;
}
