/** 问题等级：ERROR 致命（影响 ok），WARN 非致命（已自动修复或仅为提示） */
export type IssueLevel = 'ERROR' | 'WARN';

/** 校验问题统一表示（引擎与报告共用） */
export interface ValidationIssue {
  /** 严重等级。 */
  level: IssueLevel;
  /** 机器可读错误码（如 BAD_FRAME / VM_RULE_FIXED / POINT_ID_INVALID_FOR_OBJECT）。 */
  code: string;
  /** JSON Pointer 风格路径（如 "/sequence/0/frame"）；计划根部问题为空串。 */
  path: string;
  /** 人类可读消息（面向规划者/日志）。 */
  message: string;
  /** 可选：修复建议。 */
  hint?: string;
}
