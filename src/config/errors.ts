// 配置错误：缺少必填环境变量或取值非法，入口捕获后以非零退出码结束

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}
