/**
 * パイプラインのエラー分類
 *
 * いずれも1文書のビルドを中断する致命的エラー。
 * メタデータの問題はエラーではなく MetadataWarning として返す。
 */

export class OrgPressError extends Error {
  constructor(
    message: string,
    /** 問題の行（1-indexed、不明な場合は null） */
    public readonly line: number | null = null
  ) {
    super(line === null ? message : `${message} (line ${line})`);
    this.name = 'OrgPressError';
  }
}

/**
 * 文書構造の不整合
 */
export class StructuralError extends OrgPressError {
  constructor(message: string, line: number | null = null) {
    super(message, line);
    this.name = 'StructuralError';
  }
}

/**
 * 閉じられていない `#+begin_…` ブロックまたはドロワー
 */
export class MalformedBlockError extends StructuralError {
  constructor(
    public readonly blockKind: string,
    openingLine: number
  ) {
    super(`Unterminated ${blockKind} block`, openingLine);
    this.name = 'MalformedBlockError';
  }
}

/**
 * 定義されていない noweb 名への参照
 */
export class UndefinedReferenceError extends StructuralError {
  constructor(
    public readonly reference: string,
    line: number
  ) {
    super(`Undefined noweb reference <<${reference}>>`, line);
    this.name = 'UndefinedReferenceError';
  }
}

/**
 * 同じIDの脚注が複数定義されている
 */
export class DuplicateFootnoteError extends StructuralError {
  constructor(
    public readonly footnoteId: string,
    line: number
  ) {
    super(`Duplicate footnote definition [fn:${footnoteId}]`, line);
    this.name = 'DuplicateFootnoteError';
  }
}

/**
 * noweb 展開の循環参照
 */
export class CyclicReferenceError extends OrgPressError {
  constructor(
    /** 循環を含む参照チェーン（例: ['a', 'b', 'a']） */
    public readonly chain: readonly string[],
    line: number
  ) {
    super(`Cyclic noweb reference: ${chain.join(' -> ')}`, line);
    this.name = 'CyclicReferenceError';
  }
}

/**
 * 対応する定義のない脚注参照
 */
export class UnresolvedFootnoteError extends OrgPressError {
  constructor(public readonly footnoteId: string) {
    super(`Unresolved footnote reference [fn:${footnoteId}]`);
    this.name = 'UnresolvedFootnoteError';
  }
}
