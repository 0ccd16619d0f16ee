/**
 * 設定エラー
 * 起動時に検出され、パイプラインは running に遷移しない
 */
export class ConfigurationError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n${issues.join('\n')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}
