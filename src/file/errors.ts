/**
 * 収集処理のエラー定義
 */

/** ソースディレクトリが存在しない、ディレクトリではない、または読めない */
export class InvalidSourceError extends Error {
  constructor(
    public readonly sourceDir: string,
    public readonly originalError?: Error,
    reason = "not found",
  ) {
    super(`Source directory '${sourceDir}' ${reason}`);
    this.name = "InvalidSourceError";
  }
}

/** 出力ディレクトリが既に存在する（--force なし） */
export class OutputExistsError extends Error {
  constructor(public readonly outputDir: string) {
    super(
      `Output directory '${outputDir}' already exists. Use --force to overwrite.`,
    );
    this.name = "OutputExistsError";
  }
}

/** 出力ディレクトリへの書き込みに失敗（致命的） */
export class OutputWriteError extends Error {
  constructor(
    message: string,
    public readonly outputPath: string,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = "OutputWriteError";
  }
}

/**
 * 候補ファイルが読めない、または走査後に消えた
 *
 * 例外として送出せず、収集結果に記録して処理を続行する
 */
export class FileNotFoundWarning extends Error {
  constructor(
    public readonly relativePath: string,
    public readonly sourcePath: string,
    public readonly originalError?: Error,
  ) {
    super(`Not found or unreadable: ${relativePath}`);
    this.name = "FileNotFoundWarning";
  }
}

/** 走査中のサブディレクトリが読めない（中身はスキップ） */
export class UnreadableDirectoryWarning extends Error {
  constructor(
    public readonly relativePath: string,
    public readonly dirPath: string,
    public readonly originalError?: Error,
  ) {
    super(`Cannot read directory: ${relativePath}/`);
    this.name = "UnreadableDirectoryWarning";
  }
}
