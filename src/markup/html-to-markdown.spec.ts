import {
  convertPlatformHtmlToMarkdown,
  extractMediaReferences,
  extractPlatformContent,
  fileBasePath,
  htmlToMarkdown,
  platformFileId,
} from './html-to-markdown';

describe('html-to-markdown', () => {
  describe('htmlToMarkdown', () => {
    it('should convert headings and inline emphasis', () => {
      expect(htmlToMarkdown('<h1>Title</h1><p>Some <strong>bold</strong> and <em>it</em>.</p>')).toBe(
        '# Title\n\nSome **bold** and *it*.'
      );
    });

    it('should nest lists with 4 spaces and single-space markers', () => {
      expect(htmlToMarkdown('<ul><li>a<ul><li>b</li></ul></li></ul>')).toBe('- a\n    - b');
    });

    it('should keep language hints on fenced code', () => {
      expect(htmlToMarkdown('<pre><code class="language-js">const x = 1;\n</code></pre>')).toBe(
        '```js\nconst x = 1;\n```'
      );
    });

    it('should unwrap highlighted code blocks', () => {
      const html = '<div class="codehilite language-ruby"><pre><span></span><code>x = 1 &lt; 2\n</code></pre></div>';

      expect(htmlToMarkdown(html)).toBe('```ruby\nx = 1 < 2\n```');
    });

    it('should turn code sentinels into fences', () => {
      expect(htmlToMarkdown('<p>[code=ruby]</p><p>print(1)</p><p>[/code]</p>')).toBe('```ruby\nprint(1)\n```');
    });

    it('should map platform file URLs to local paths', () => {
      const resolve = (url: string): string | undefined =>
        platformFileId(url) === '101' ? 'assets/images/photo.jpg' : undefined;

      expect(htmlToMarkdown('<p><img src="/courses/1/files/101/preview" alt="P"></p>', resolve)).toBe(
        '![P](assets/images/photo.jpg)'
      );
      expect(htmlToMarkdown('<p><img src="/courses/1/files/7/preview" alt="Q"></p>', resolve)).toBe(
        '![Q](/courses/1/files/7/preview)'
      );
    });

    it('should drop scripts', () => {
      expect(htmlToMarkdown('<p>Kept</p><script>alert(1)</script>')).toBe('Kept');
    });
  });

  describe('extractPlatformContent', () => {
    it('should prefer the user content wrapper', () => {
      const html = '<html><body><nav>Menu</nav><div class="user_content"><p>Hi</p></div></body></html>';

      expect(extractPlatformContent(html)).toBe('<p>Hi</p>');
    });

    it('should fall back to the body', () => {
      expect(extractPlatformContent('<html><body> <p>Only</p> </body></html>')).toBe('<p>Only</p>');
    });
  });

  describe('convertPlatformHtmlToMarkdown', () => {
    it('should strip the template and report the strategies used', () => {
      // Arrange
      const html =
        '<html><body><div class="user_content">' +
        '<div class="banner"><p>Welcome to BIO 101</p></div>' +
        '<p>Body text</p>' +
        '<p>Questions? Email the TA.</p>' +
        '</div></body></html>';
      const template = {
        headerHtml: '<div class="banner"><p>Welcome to BIO 101</p></div>',
        footerMarkdown: 'Questions? Email the TA.',
      };

      // Act
      const result = convertPlatformHtmlToMarkdown(html, { template });

      // Assert
      expect(result).toEqual({ markdown: 'Body text', header: 'exact-html', footer: 'exact-html' });
    });

    it('should keep everything when the template is not found', () => {
      const result = convertPlatformHtmlToMarkdown('<p>Body</p>', { template: { headerHtml: '<p>Other</p>' } });

      expect(result).toEqual({ markdown: 'Body', header: 'none', footer: 'absent' });
    });
  });

  describe('references', () => {
    it('should decode file base paths', () => {
      expect(fileBasePath('$IMS-CC-FILEBASE$/images/my%20photo.jpg?canvas_download=1')).toBe('images/my photo.jpg');
      expect(fileBasePath('/files/1')).toBeUndefined();
    });

    it('should list media and file links with platform ids', () => {
      const html =
        '<p><img src="/courses/1/files/101/preview" alt="P">' +
        '<a href="https://example.com">x</a>' +
        '<a href="$IMS-CC-FILEBASE$/docs/a.pdf">a</a>' +
        '<iframe src="https://video.example/embed/1"></iframe></p>';

      expect(extractMediaReferences(html)).toEqual([
        { tag: 'img', url: '/courses/1/files/101/preview', fileId: '101', alt: 'P' },
        { tag: 'iframe', url: 'https://video.example/embed/1', fileId: undefined, alt: undefined },
        { tag: 'a', url: '$IMS-CC-FILEBASE$/docs/a.pdf', fileId: undefined, alt: undefined },
      ]);
    });
  });
});
