export interface KnowledgeEntry {
  /** 触发短语，按子串匹配（大小写不敏感） */
  readonly trigger: string;
  readonly aliases: readonly string[];
  readonly title: string;
  readonly document: string;
}

export interface RetrievalResult {
  matched: boolean;
  trigger?: string;
  title?: string;
  document: string;
}

export interface KnowledgeGuideSummary {
  trigger: string;
  aliases: string[];
  title: string;
}
