import type { Block, CodeBlock, Document } from '@orgpress/types';
import { CyclicReferenceError, UndefinedReferenceError } from '../errors.js';

const REFERENCE_RE = /<<([^<>\s]+)>>/;
const REFERENCE_GLOBAL_RE = /<<([^<>\s]+)>>/g;

type NamedBlocks = ReadonlyMap<string, readonly CodeBlock[]>;

/**
 * 名前付きコードブロックを文書順に集める（同名のブロックは連結対象）
 */
function collectNamedBlocks(blocks: readonly Block[], into: Map<string, CodeBlock[]>): void {
  for (const block of blocks) {
    if (block.type === 'heading') {
      collectNamedBlocks(block.children, into);
    } else if (block.type === 'code' && block.name !== null) {
      const existing = into.get(block.name);
      if (existing) {
        existing.push(block);
      } else {
        into.set(block.name, [block]);
      }
    }
  }
}

/**
 * noweb 参照を展開した新しい Document を返す
 *
 * - `noweb: 'expand'` のブロックは `<<name>>` を同名ブロックの本文で置き換える（再帰的）
 * - `noweb: 'strip'` のブロックは参照を取り除く（名前が未定義ならエラー）
 * - 参照を持たないブロックは同じオブジェクトのまま返す
 *
 * 循環は展開中の名前集合（引数で受け渡す）で検出し、CyclicReferenceError を投げる。
 * エラーの行は常に展開元ブロックの開始行。
 */
export function resolveNoweb(document: Document): Document {
  const named = new Map<string, CodeBlock[]>();
  collectNamedBlocks(document.blocks, named);

  return {
    ...document,
    blocks: resolveBlocks(document.blocks, named),
  };
}

function resolveBlocks(blocks: readonly Block[], named: NamedBlocks): Block[] {
  return blocks.map((block) => {
    if (block.type === 'heading') {
      return { ...block, children: resolveBlocks(block.children, named) };
    }
    if (block.type === 'code') {
      return resolveCodeBlock(block, named);
    }
    return block;
  });
}

function resolveCodeBlock(block: CodeBlock, named: NamedBlocks): CodeBlock {
  if (block.references.length === 0) {
    return block;
  }

  if (block.noweb === 'strip') {
    return { ...block, text: stripReferences(block, block.startLine, named) };
  }

  const start = block.name === null ? [] : [block.name];
  return {
    ...block,
    text: expandText(block.text, new Set(start), start, block.startLine, named),
  };
}

function stripReferences(block: CodeBlock, line: number, named: NamedBlocks): string {
  for (const name of block.references) {
    if (!named.has(name)) {
      throw new UndefinedReferenceError(name, line);
    }
  }
  return block.text.replace(REFERENCE_GLOBAL_RE, '');
}

/**
 * テキスト中の参照を出現順に展開
 * @param visited 展開中の名前（祖先のみ。兄弟の展開とは共有しない）
 * @param chain エラー表示用の参照チェーン
 * @param line 展開元ブロックの開始行
 */
function expandText(
  text: string,
  visited: ReadonlySet<string>,
  chain: readonly string[],
  line: number,
  named: NamedBlocks
): string {
  return text
    .split('\n')
    .map((textLine) => expandLine(textLine, visited, chain, line, named))
    .join('\n');
}

/**
 * 1行を展開する。参照より前の文字列は挿入される各行の先頭に付く
 */
function expandLine(
  textLine: string,
  visited: ReadonlySet<string>,
  chain: readonly string[],
  line: number,
  named: NamedBlocks
): string {
  const match = REFERENCE_RE.exec(textLine);
  if (!match) {
    return textLine;
  }

  const name = match[1];
  const prefix = textLine.slice(0, match.index);
  const suffix = textLine.slice(match.index + match[0].length);

  if (visited.has(name)) {
    throw new CyclicReferenceError([...chain, name], line);
  }

  const targets = named.get(name);
  if (!targets) {
    throw new UndefinedReferenceError(name, line);
  }

  const nextVisited = new Set(visited).add(name);
  const nextChain = [...chain, name];
  const body = targets
    .map((target) => {
      switch (target.noweb) {
        case 'expand':
          return expandText(target.text, nextVisited, nextChain, line, named);
        case 'strip':
          return stripReferences(target, line, named);
        case 'off':
          return target.text;
      }
    })
    .join('\n');

  const inserted = body.split('\n').map((bodyLine) => prefix + bodyLine);
  const last = inserted.pop() ?? prefix;
  return [...inserted, last + expandLine(suffix, visited, chain, line, named)].join('\n');
}
