/**
 * 标签统计类型
 */

export interface LabelValueStats {
  value: string;
  /** 选中该值的过滤表达式 name=value */
  raw: string;
  hits: number;
  percent: number;
  offset: number;
}

export interface LabelNameStats {
  name: string;
  hits: number;
  values: LabelValueStats[];
}
