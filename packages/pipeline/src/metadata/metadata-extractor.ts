import type {
  Block,
  ChangelogEntry,
  DocumentMetadata,
  HeadingBlock,
  InlineSpan,
  KeywordLine,
  MetadataWarning,
} from '@orgpress/types';
import { spansToText } from '../parser/inline-parser.js';

export interface MetadataResult {
  metadata: DocumentMetadata;
  warnings: MetadataWarning[];
}

type SingleField = 'title' | 'summary' | 'date' | 'author';

/** 単一値のキーワード（別名を含む） */
const SINGLE_VALUED: ReadonlyMap<string, SingleField> = new Map<string, SingleField>([
  ['title', 'title'],
  ['summary', 'summary'],
  ['description', 'summary'],
  ['date', 'date'],
  ['author', 'author'],
]);

const TAG_KEYS = new Set(['tags', 'filetags']);
const CHANGELOG_TITLE_RE = /^change\s*log$/i;

/**
 * 先頭キーワードと Changelog セクションからメタデータを抽出
 *
 * 欠けているフィールドは空文字列・空配列になる。問題はエラーにせず warnings で返す。
 */
export function extractMetadata(
  keywords: readonly KeywordLine[],
  blocks: readonly Block[]
): MetadataResult {
  const warnings: MetadataWarning[] = [];
  const single: Partial<Record<SingleField, string>> = {};
  const tags = new UniqueList();
  const keywordList = new UniqueList();
  const properties = new Map<string, string>();

  for (const keyword of keywords) {
    const value = keyword.value.trim();

    if (value.length === 0) {
      warnings.push({ message: `Empty value for #+${keyword.key}`, line: keyword.line });
      continue;
    }

    const field = SINGLE_VALUED.get(keyword.key);
    if (field) {
      if (single[field] !== undefined) {
        warnings.push({
          message: `Duplicate #+${keyword.key} ignored`,
          line: keyword.line,
        });
        continue;
      }
      single[field] = value;
      continue;
    }

    if (TAG_KEYS.has(keyword.key)) {
      tags.addAll(value.split(/[\s,:]+/));
      continue;
    }

    if (keyword.key === 'keywords') {
      keywordList.addAll(value.split(','));
      continue;
    }

    const previous = properties.get(keyword.key);
    properties.set(keyword.key, previous === undefined ? value : `${previous} ${value}`);
  }

  const changelog = extractChangelog(blocks, warnings);

  return {
    metadata: {
      title: single.title ?? '',
      tags: tags.values(),
      keywords: keywordList.values(),
      summary: single.summary ?? '',
      date: single.date ?? '',
      author: single.author ?? '',
      changelog,
      properties: Object.fromEntries(properties),
    },
    warnings,
  };
}

/**
 * 重複を除いて宣言順を保つリスト
 */
class UniqueList {
  private readonly items: string[] = [];
  private readonly seen = new Set<string>();

  addAll(values: string[]): void {
    for (const raw of values) {
      const value = raw.trim();
      if (value.length === 0 || this.seen.has(value)) {
        continue;
      }
      this.seen.add(value);
      this.items.push(value);
    }
  }

  values(): string[] {
    return [...this.items];
  }
}

/**
 * 最後の Changelog 見出しを探す
 */
function findChangelogHeading(blocks: readonly Block[]): HeadingBlock | null {
  let found: HeadingBlock | null = null;
  for (const block of blocks) {
    if (block.type !== 'heading') {
      continue;
    }
    if (CHANGELOG_TITLE_RE.test(spansToText(block.title).trim())) {
      found = block;
    }
    const nested = findChangelogHeading(block.children);
    if (nested) {
      found = nested;
    }
  }
  return found;
}

function extractChangelog(blocks: readonly Block[], warnings: MetadataWarning[]): ChangelogEntry[] {
  const heading = findChangelogHeading(blocks);
  if (!heading) {
    return [];
  }

  const entries: ChangelogEntry[] = [];

  const addEntry = (content: readonly InlineSpan[], line: number): void => {
    const entry = toChangelogEntry(content);
    if (entry) {
      entries.push(entry);
    } else {
      warnings.push({ message: 'Changelog entry without a bold date marker', line });
    }
  };

  for (const block of heading.children) {
    if (block.type === 'list') {
      for (const item of block.items) {
        addEntry(item.content, item.line);
      }
    } else if (block.type === 'paragraph') {
      addEntry(block.content, block.startLine);
    }
  }

  return entries;
}

/**
 * `*2020-06-19* : 説明` 形式のスパン列をエントリに変換。太字で始まらなければ null
 */
function toChangelogEntry(content: readonly InlineSpan[]): ChangelogEntry | null {
  const [first, ...rest] = content;
  if (!first || first.type !== 'bold') {
    return null;
  }

  return {
    date: spansToText(first.children).trim(),
    description: spansToText(rest).trim().replace(/^[:-]\s*/, ''),
  };
}
