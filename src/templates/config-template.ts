/**
 * 設定ファイル (.artifacts) のテンプレート
 */

export const CONFIG_TEMPLATE = `# List files to copy, one per line:
# - Specific path: src/file.js
# - Any file: filename.txt
# - Glob patterns: app/*.php, docs/**/*.md
# - Exclude with a leading '!': !vendor
#
# Lines starting with '#' are comments. Exclusions always win over inclusions.

`;
