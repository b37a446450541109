/**
 * 出力ファイル名の割り当て
 *
 * ディレクトリ構造を捨てて平坦化するため、同名ファイルが衝突した場合は
 * 拡張子の直前に連番を挿入する（`name_1.ext`, `name_2.ext`）。
 * 連番は実行全体で単調増加し、再利用しない。
 */

/**
 * ファイル名を語幹と拡張子に分割する
 *
 * 先頭のドットは拡張子の区切りとみなさない（`.env` → 拡張子なし）
 */
export function splitExtension(fileName: string): {
  stem: string;
  ext: string;
} {
  const index = fileName.lastIndexOf(".");
  if (index <= 0) {
    return { stem: fileName, ext: "" };
  }
  return { stem: fileName.slice(0, index), ext: fileName.slice(index) };
}

/** 出力ファイル名の割り当て器 */
export class NameAllocator {
  private readonly taken = new Set<string>();
  private readonly reserved: ReadonlySet<string>;
  private counter = 0;

  /**
   * @param reserved 最初から使用済みとして扱う名前（メタデータファイル等）
   */
  constructor(reserved: readonly string[] = []) {
    this.reserved = new Set(reserved);
    for (const name of reserved) {
      this.taken.add(name);
    }
  }

  /**
   * 出力ファイル名を割り当てる
   *
   * @param baseName 元ファイル名
   * @returns 実行内で一意なファイル名
   */
  allocate(baseName: string): string {
    if (!this.taken.has(baseName)) {
      this.taken.add(baseName);
      return baseName;
    }

    const { stem, ext } = splitExtension(baseName);
    let candidate: string;
    do {
      this.counter++;
      candidate = `${stem}_${this.counter}${ext}`;
    } while (this.taken.has(candidate));

    this.taken.add(candidate);
    return candidate;
  }

  /**
   * 割り当てを取り消す（連番は戻さない）
   */
  release(name: string): void {
    if (!this.reserved.has(name)) {
      this.taken.delete(name);
    }
  }
}
