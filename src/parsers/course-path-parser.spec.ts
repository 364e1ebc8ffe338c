import { parseItemPath, parseModuleFolderName, compareOrderable, orderModuleTitles } from './course-path-parser';

describe('course-path-parser', () => {
  describe('parseModuleFolderName', () => {
    it('should split prefix and title', () => {
      expect(parseModuleFolderName('01-Week 1.module')).toEqual({ title: 'Week 1', orderPrefix: 1 });
    });

    it('should ignore folders without the module suffix', () => {
      expect(parseModuleFolderName('Week 1')).toBeUndefined();
    });
  });

  describe('parseItemPath', () => {
    it('should read kind, prefix and enclosing module', () => {
      const info = parseItemPath('content/01-Week 1.module/02-intro.page');

      expect(info).toEqual({
        kind: 'page',
        relativeDir: 'content/01-Week 1.module/02-intro.page',
        baseName: 'intro',
        orderPrefix: 2,
        module: { title: 'Week 1', orderPrefix: 1, relativeDir: 'content/01-Week 1.module' },
      });
    });

    it('should handle items outside modules and windows separators', () => {
      const info = parseItemPath('content\\syllabus.assignment');
      expect(info?.kind).toBe('assignment');
      expect(info?.relativeDir).toBe('content/syllabus.assignment');
      expect(info?.module).toBeUndefined();
    });

    it('should return undefined for plain folders', () => {
      expect(parseItemPath('content/images')).toBeUndefined();
    });
  });

  describe('compareOrderable', () => {
    it('should order by position, then prefix, then name', () => {
      const items = [
        { name: 'zeta' },
        { name: 'beta', orderPrefix: 2 },
        { name: 'alpha', orderPrefix: 3 },
        { name: 'gamma', position: 1, orderPrefix: 9 },
        { name: 'delta' },
      ];

      expect([...items].sort(compareOrderable).map(i => i.name)).toEqual(['gamma', 'beta', 'alpha', 'delta', 'zeta']);
    });
  });

  describe('orderModuleTitles', () => {
    const modules = [
      { title: 'Week 2', orderPrefix: 2 },
      { title: 'Week 1', orderPrefix: 1 },
      { title: 'Appendix' },
      { title: 'Welcome' },
    ];

    it('should fall back to prefix then lexical order', () => {
      expect(orderModuleTitles(modules)).toEqual(['Week 1', 'Week 2', 'Appendix', 'Welcome']);
    });

    it('should put explicitly ordered modules first', () => {
      expect(orderModuleTitles(modules, ['Welcome', 'Week 2'])).toEqual(['Welcome', 'Week 2', 'Week 1', 'Appendix']);
    });
  });
});
