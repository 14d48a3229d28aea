// 日志类型与结构化条目
// 控制台由 LOG_LEVEL 过滤（默认 info），CI 日志里只留下有用的行

/** 日志级别（debug < info < warn < error） */
export type LogLevel = "error" | "warn" | "info" | "debug";

/** 日志分类：按模块区分输出 */
export type LogCategory =
  | "feed"    // appcast 加载、合并、序列化
  | "config"  // 环境变量与路径
  | "app";    // 命令行入口

/** 单条日志的结构化数据 */
export interface LogEntry {
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** 可选上下文（err、version、path 等） */
  payload?: Record<string, unknown>;
}
