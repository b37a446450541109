/**
 * ファイルシステム操作の抽象化インターフェース
 *
 * ファイルシステムへのアクセスを抽象化し、テスト時にモックを注入可能にする
 */

import fse from "fs-extra";

/** ファイル/ディレクトリの情報 */
export interface FileInfo {
  /** ファイルサイズ */
  size: number;
  /** ファイルかどうか */
  isFile: boolean;
  /** ディレクトリかどうか */
  isDirectory: boolean;
}

/** ディレクトリエントリ */
export interface DirEntry {
  /** エントリ名 */
  name: string;
  /** ファイルかどうか */
  isFile: boolean;
  /** ディレクトリかどうか */
  isDirectory: boolean;
  /** シンボリックリンクかどうか */
  isSymlink: boolean;
}

/** ファイルシステムインターフェース */
export interface FileSystem {
  /**
   * ファイル/ディレクトリの情報を取得（リンクは追跡する）
   * @throws パスが存在しない場合は ENOENT
   */
  stat(path: string): Promise<FileInfo>;

  /** パスが存在するか */
  exists(path: string): Promise<boolean>;

  /** ディレクトリ内のエントリを取得 */
  readDir(path: string): AsyncIterable<DirEntry>;

  /** ファイル先頭の最大 length バイトを読み込む */
  readHead(path: string, length: number): Promise<Uint8Array>;

  /** 読み取り可能か確認する（不可の場合は例外） */
  checkReadable(path: string): Promise<void>;

  /** ファイルをバイト単位でコピーする */
  copyFile(src: string, dest: string): Promise<void>;

  /** ディレクトリを（親も含めて）作成する */
  ensureDir(path: string): Promise<void>;

  /** テキストファイルを書き込む */
  writeTextFile(path: string, content: string): Promise<void>;

  /** ファイルまたはディレクトリを再帰的に削除する */
  remove(path: string): Promise<void>;

  /** シンボリックリンクを解決した実際のパスを取得 */
  realPath(path: string): Promise<string>;
}

/**
 * デフォルトのファイルシステム実装
 *
 * fs-extra を使用してファイルシステムにアクセスする
 */
export class NodeFileSystem implements FileSystem {
  async stat(path: string): Promise<FileInfo> {
    const stat = await fse.stat(path);
    return {
      size: stat.size,
      isFile: stat.isFile(),
      isDirectory: stat.isDirectory(),
    };
  }

  async exists(path: string): Promise<boolean> {
    return await fse.pathExists(path);
  }

  async *readDir(path: string): AsyncIterable<DirEntry> {
    const entries = await fse.readdir(path, { withFileTypes: true });
    for (const entry of entries) {
      yield {
        name: entry.name,
        isFile: entry.isFile(),
        isDirectory: entry.isDirectory(),
        isSymlink: entry.isSymbolicLink(),
      };
    }
  }

  async readHead(path: string, length: number): Promise<Uint8Array> {
    const fd = await fse.open(path, "r");
    try {
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await fse.read(fd, buffer, 0, length, 0);
      return buffer.subarray(0, bytesRead);
    } finally {
      await fse.close(fd);
    }
  }

  async checkReadable(path: string): Promise<void> {
    await fse.access(path, fse.constants.R_OK);
  }

  async copyFile(src: string, dest: string): Promise<void> {
    await fse.copyFile(src, dest);
  }

  async ensureDir(path: string): Promise<void> {
    await fse.ensureDir(path);
  }

  async writeTextFile(path: string, content: string): Promise<void> {
    await fse.writeFile(path, content, "utf8");
  }

  async remove(path: string): Promise<void> {
    await fse.remove(path);
  }

  async realPath(path: string): Promise<string> {
    return await fse.realpath(path);
  }
}

/** デフォルトのファイルシステムインスタンス */
export const defaultFileSystem = new NodeFileSystem();
