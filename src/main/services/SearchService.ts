import type { PasswordItem, SearchCriteria } from '../../shared/types';
import { SEARCH_CONFIG } from '../config';
import { logDebug } from '../logger';

type WeightedField = keyof typeof SEARCH_CONFIG.fieldWeights;

const WEIGHTED_FIELDS: WeightedField[] = ['site_name', 'login_account', 'email', 'phone', 'url', 'notes'];

/**
 * 内存中的相关度搜索与域名匹配。只处理调用方传入的快照，不访问数据库
 */
export class SearchService {
  /**
   * 按相关度排序并过滤：完全匹配 > 开头匹配 > 包含 > 模糊，各乘以字段权重后累加。
   * 关键字为空时原样返回输入
   */
  public searchPasswords(passwords: PasswordItem[], keyword: string): PasswordItem[] {
    const kw = keyword.trim().toLowerCase();
    if (kw.length < SEARCH_CONFIG.minKeywordLength) return passwords;

    const scored: Array<{ item: PasswordItem; score: number }> = [];
    for (const item of passwords) {
      const score = this.calculateScore(item, kw);
      if (score > 0) scored.push({ item, score });
    }
    // Array.prototype.sort 是稳定排序，同分保持输入顺序
    scored.sort((a, b) => b.score - a.score);
    logDebug('SEARCH_RANKED', 'ranked search finished', { keyword: kw, count: scored.length });
    return scored.slice(0, SEARCH_CONFIG.maxResults).map(s => s.item);
  }

  /** 单条记录对关键字的相关度分数 */
  public scorePassword(password: PasswordItem, keyword: string): number {
    return this.calculateScore(password, keyword.trim().toLowerCase());
  }

  private calculateScore(password: PasswordItem, kw: string): number {
    if (!kw) return 0;
    let score = 0;
    for (const field of WEIGHTED_FIELDS) {
      const value = password[field];
      if (!value) continue;
      const text = value.toLowerCase();
      const weight = SEARCH_CONFIG.fieldWeights[field];
      if (text === kw) score += weight * 10;
      else if (text.startsWith(kw)) score += weight * 5;
      else if (text.includes(kw)) score += weight * 3;
      else if (this.fuzzyMatch(kw, text)) score += weight;
    }
    return score;
  }

  /** 去空格后包含，或关键字的每个字符都出现在文本中（不计顺序与次数） */
  public fuzzyMatch(keyword: string, text: string): boolean {
    if (text.replace(/ /g, '').includes(keyword.replace(/ /g, ''))) return true;
    const chars = new Set(text);
    for (const ch of new Set(keyword)) {
      if (!chars.has(ch)) return false;
    }
    return true;
  }

  /** 标准化域名：小写、去空白、从 URL 中取主机名、去掉 www. 前缀 */
  public normalizeDomain(value: string): string {
    let domain = value.toLowerCase().trim();
    if (domain.includes('://')) {
      domain = this.extractHost(domain);
    }
    if (domain.startsWith('www.')) domain = domain.slice(4);
    return domain;
  }

  private extractHost(url: string): string {
    try {
      return new URL(url).hostname || url;
    } catch {
      // 无法解析的 URL 按原文比较
      return url;
    }
  }

  /**
   * 域名匹配：相同，或一方是另一方的子域名。
   * 不做简单包含判断，google.com 不会匹配 google.com.cn
   */
  public matchDomain(domain1: string, domain2: string): boolean {
    if (!domain1 || !domain2) return false;
    const a = this.normalizeDomain(domain1);
    const b = this.normalizeDomain(domain2);
    if (!a || !b) return false;
    if (a === b) return true;
    return a.endsWith('.' + b) || b.endsWith('.' + a);
  }

  /** 网站名称或网址与目标域名匹配的条目 */
  public findPasswordsByDomain(passwords: PasswordItem[], domain: string): PasswordItem[] {
    const target = this.normalizeDomain(domain);
    const matched = passwords.filter(p => {
      if (p.site_name && this.matchDomain(target, p.site_name)) return true;
      return !!p.url && this.matchDomain(target, this.normalizeDomain(p.url));
    });
    logDebug('SEARCH_DOMAIN', 'domain lookup finished', { domain: target, count: matched.length });
    return matched;
  }

  /** 多条件筛选：关键字 → 分类 → 是否有邮箱 → 是否有手机号，未给出的条件跳过 */
  public filterByCriteria(passwords: PasswordItem[], criteria: SearchCriteria): PasswordItem[] {
    let filtered = passwords;
    if (criteria.keyword) filtered = this.searchPasswords(filtered, criteria.keyword);
    if (criteria.category) {
      const category = criteria.category;
      filtered = filtered.filter(p => p.category === category);
    }
    if (criteria.hasEmail !== undefined) {
      const want = criteria.hasEmail;
      filtered = filtered.filter(p => !!p.email === want);
    }
    if (criteria.hasPhone !== undefined) {
      const want = criteria.hasPhone;
      filtered = filtered.filter(p => !!p.phone === want);
    }
    return filtered;
  }
}

export default SearchService;
