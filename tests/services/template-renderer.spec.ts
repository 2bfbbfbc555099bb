import { describe, expect, it } from 'vitest';
import { formatDate, formatTime, renderContent, renderTemplate } from '../../src/services/template-renderer.js';
import type { Template } from '../../src/types/dispatch.js';

const NOW = new Date(2024, 2, 5, 9, 7);

function template(content: Template['content'], buttons?: Template['buttons']): Template {
  return { id: 't', name: 'T', content, buttons, createdAt: '2024-03-05T09:00:00.000Z' };
}

describe('renderTemplate', () => {
  it('formats local dates and times', () => {
    expect(formatDate(NOW)).toBe('2024-03-05');
    expect(formatTime(NOW)).toBe('09:07');
  });

  it('substitutes known placeholders and leaves unknown ones', () => {
    expect(renderTemplate('{date} {time} hi {username}, {username}! {unknown}', { username: 'amy' }, NOW)).toBe(
      '2024-03-05 09:07 hi amy, amy! {unknown}',
    );
  });

  it('skips undefined values and stringifies numbers', () => {
    expect(renderTemplate('{user_id}/{count}', { user_id: undefined, count: 3 }, NOW)).toBe('{user_id}/3');
  });

  it('does not expand placeholders inside substituted values', () => {
    expect(renderTemplate('{username} ({user_id})', { username: '{user_id}', user_id: '42' }, NOW)).toBe('{user_id} (42)');
    expect(renderTemplate('{constructor}', {}, NOW)).toBe('{constructor}');
  });

  it('lets callers override the date placeholder', () => {
    expect(renderTemplate('{date}', { date: 'tomorrow' }, NOW)).toBe('tomorrow');
  });
});

describe('renderContent', () => {
  it('renders text with trimmed buttons, dropping those without a URL', () => {
    const rendered = renderContent(
      template({ mode: 'text', text: 'Hello {username}' }, [
        { label: ' Shop ', url: ' https://example.com/shop ' },
        { label: '', url: 'https://example.com' },
        { label: 'Nowhere', url: '   ' },
      ]),
      { username: 'amy' },
      NOW,
    );

    expect(rendered).toEqual({
      mode: 'text',
      text: 'Hello amy',
      buttons: [
        { label: 'Shop', url: 'https://example.com/shop' },
        { label: 'Link', url: 'https://example.com' },
      ],
    });
  });

  it('renders media captions and keeps media without one', () => {
    expect(
      renderContent(template({ mode: 'media', mediaKind: 'photo', mediaRef: 'media/a.jpg', caption: 'For {username}' }), { username: 'ben' }, NOW),
    ).toEqual({ mode: 'media', mediaKind: 'photo', mediaRef: 'media/a.jpg', caption: 'For ben', buttons: [] });

    expect(renderContent(template({ mode: 'media', mediaKind: 'video', mediaRef: 'media/b.mp4' }), {}, NOW)).toEqual({
      mode: 'media',
      mediaKind: 'video',
      mediaRef: 'media/b.mp4',
      caption: undefined,
      buttons: [],
    });
  });

  it('passes forwards through untouched', () => {
    expect(renderContent(template({ mode: 'forward', fromChannel: 'news', messageId: 42 }), { username: 'amy' }, NOW)).toEqual({
      mode: 'forward',
      fromChannel: 'news',
      messageId: 42,
    });
  });
});
