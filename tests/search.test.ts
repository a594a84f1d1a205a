import { beforeEach, describe, expect, it } from 'vitest';
import { SearchService } from '../src/main/services/SearchService';
import { makeItem } from './helpers';

describe('SearchService', () => {
  let search: SearchService;

  beforeEach(() => {
    search = new SearchService();
  });

  describe('searchPasswords', () => {
    it('ranks prefix matches and keeps their input order', () => {
      const items = [makeItem({ site_name: 'GitHub' }), makeItem({ site_name: 'Git Lab' }), makeItem({ site_name: 'gitlink' })];
      const result = search.searchPasswords(items, 'git');
      expect(result.map(p => p.site_name)).toEqual(['GitHub', 'Git Lab', 'gitlink']);
      expect(items.map(p => search.scorePassword(p, 'git'))).toEqual([50, 50, 50]);
    });

    it('scores an exact case-insensitive match highest', () => {
      const items = [makeItem({ site_name: 'Git Lab' }), makeItem({ site_name: 'GitHub' }), makeItem({ site_name: 'gitlink' })];
      expect(search.scorePassword(items[1], 'github')).toBe(100);
      expect(search.searchPasswords(items, 'GitHub').map(p => p.site_name)).toEqual(['GitHub']);
    });

    it('ranks fuzzy matches below prefix matches', () => {
      const items = [makeItem({ site_name: 'Tiger Gym' }), makeItem({ site_name: 'tgmall' })];
      expect(search.searchPasswords(items, 'tgm').map(p => p.site_name)).toEqual(['tgmall', 'Tiger Gym']);
      expect(search.scorePassword(items[0], 'tgm')).toBe(10);
      expect(search.scorePassword(items[1], 'tgm')).toBe(50);
    });

    it('scores a substring match at three times the weight', () => {
      expect(search.scorePassword(makeItem({ site_name: 'MyGitHub' }), 'github')).toBe(30);
    });

    it('sums weighted scores across fields', () => {
      const item = makeItem({ site_name: 'Mail', login_account: 'mail', email: 'mail@example.com' });
      // 100 (site exact) + 80 (account exact) + 35 (email prefix)
      expect(search.scorePassword(item, 'MAIL')).toBe(215);
    });

    it('drops records that do not match at all', () => {
      const items = [makeItem({ site_name: 'Bank' }), makeItem({ site_name: 'Shop', notes: 'weekly groceries' })];
      expect(search.searchPasswords(items, 'xyz')).toEqual([]);
      expect(search.searchPasswords(items, 'weekly').map(p => p.site_name)).toEqual(['Shop']);
    });

    it('returns the input unchanged for a blank keyword', () => {
      const items = [makeItem({ site_name: 'B' }), makeItem({ site_name: 'A' })];
      expect(search.searchPasswords(items, '   ')).toEqual(items);
    });

    it('caps results at 100', () => {
      const items = Array.from({ length: 150 }, (_, i) => makeItem({ site_name: `item ${i}` }));
      const result = search.searchPasswords(items, 'item');
      expect(result).toHaveLength(100);
      expect(result[0].site_name).toBe('item 0');
      expect(result[99].site_name).toBe('item 99');
    });
  });

  describe('fuzzyMatch', () => {
    it('ignores spaces and character order', () => {
      expect(search.fuzzyMatch('gitlab', 'git lab')).toBe(true);
      expect(search.fuzzyMatch('bug', 'github')).toBe(true);
      expect(search.fuzzyMatch('xyz', 'github')).toBe(false);
    });
  });

  describe('domains', () => {
    it('normalizes urls and hosts', () => {
      expect(search.normalizeDomain('https://www.Example.com/login?next=1')).toBe('example.com');
      expect(search.normalizeDomain('  WWW.Foo.org ')).toBe('foo.org');
      expect(search.normalizeDomain('mail.google.com')).toBe('mail.google.com');
    });

    it('matches identical domains and parent domains only', () => {
      expect(search.matchDomain('google.com', 'google.com.cn')).toBe(false);
      expect(search.matchDomain('mail.google.com', 'google.com')).toBe(true);
      expect(search.matchDomain('www.example.com', 'example.com')).toBe(true);
      expect(search.matchDomain('google.com', 'mail.google.com')).toBe(true);
      expect(search.matchDomain('notgoogle.com', 'google.com')).toBe(false);
      expect(search.matchDomain('', 'google.com')).toBe(false);
    });

    it('finds records by site name or url', () => {
      const items = [
        makeItem({ site_name: 'Google', url: 'https://accounts.google.com/signin' }),
        makeItem({ site_name: 'google.com.cn' }),
        makeItem({ site_name: 'mail.google.com' }),
      ];
      const result = search.findPasswordsByDomain(items, 'https://www.google.com/');
      expect(result).toEqual([items[0], items[2]]);
    });
  });

  describe('filterByCriteria', () => {
    const items = [
      makeItem({ site_name: 'Work Mail', category: '工作', email: 'w@example.com' }),
      makeItem({ site_name: 'Work Phone', category: '工作', phone: '13800000000' }),
      makeItem({ site_name: 'Game', category: '娱乐', email: 'g@example.com' }),
    ];

    it('applies every given criterion', () => {
      expect(search.filterByCriteria(items, { keyword: 'work', category: '工作', hasEmail: true }).map(p => p.site_name)).toEqual([
        'Work Mail',
      ]);
      expect(search.filterByCriteria(items, { hasPhone: false }).map(p => p.site_name)).toEqual(['Work Mail', 'Game']);
      expect(search.filterByCriteria(items, { category: '娱乐', hasEmail: false })).toEqual([]);
    });

    it('returns everything when no criterion is given', () => {
      expect(search.filterByCriteria(items, {})).toEqual(items);
    });
  });
});
