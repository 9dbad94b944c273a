import { describe, it, expect, beforeEach, vi } from 'vitest';
import { handleMediaFailure, attachMediaHandlers } from './media';
import { getStage } from './utils';
import { createContext, fire } from './test-helpers';

function render(html: string): HTMLVideoElement {
  document.body.innerHTML = html;
  const video = document.querySelector('video');
  if (!video) throw new Error('fixture missing');
  vi.spyOn(video, 'load').mockImplementation(() => {});
  return video;
}

describe('handleMediaFailure', () => {
  beforeEach(() => {
    document.body.innerHTML = '';
  });

  it('rewrites marked sources to origin and reloads', () => {
    const video = render(
      '<video>' +
        '<source data-edge-cdn="1" type="video/webm" src="https://edge.tld/origin.tld/clip.webm">' +
        '<source type="video/mp4" src="https://videos.example.org/clip.mp4">' +
      '</video>'
    );
    const [marked, foreign] = Array.from(video.querySelectorAll('source'));

    expect(handleMediaFailure(video, createContext())).toBe(true);

    expect(marked.src).toBe('https://origin.tld/clip.webm');
    expect(foreign.src).toBe('https://videos.example.org/clip.mp4');
    expect(getStage(video)).toBe('origin');
    expect(video.load).toHaveBeenCalledTimes(1);
  });

  it('rewrites a marked src and poster', () => {
    const video = render(
      '<video data-edge-cdn="1" data-edge-poster="1" ' +
        'src="https://edge.tld/origin.tld/intro.mp4" poster="https://edge.tld/origin.tld/intro.jpg"></video>'
    );

    handleMediaFailure(video, createContext());

    expect(video.src).toBe('https://origin.tld/intro.mp4');
    expect(video.poster).toBe('https://origin.tld/intro.jpg');
  });

  it('leaves an unmarked poster alone', () => {
    const video = render(
      '<video data-edge-cdn="1" src="https://edge.tld/origin.tld/intro.mp4" poster="https://cdn.example.org/still.jpg"></video>'
    );

    handleMediaFailure(video, createContext());

    expect(video.poster).toBe('https://cdn.example.org/still.jpg');
  });

  it('marks failed when there is nothing to rewrite', () => {
    const video = render('<video src="https://videos.example.org/embed.mp4"></video>');

    expect(handleMediaFailure(video, createContext())).toBe(false);

    expect(getStage(video)).toBe('failed');
    expect(video.src).toBe('https://videos.example.org/embed.mp4');
    expect(video.load).not.toHaveBeenCalled();
  });

  it('marks failed when a marked URL has no origin to decode', () => {
    const video = render('<video data-edge-cdn="1" src="https://edge.tld/onlyone.mp4"></video>');

    expect(handleMediaFailure(video, createContext())).toBe(false);

    expect(getStage(video)).toBe('failed');
    expect(video.src).toBe('https://edge.tld/onlyone.mp4');
    expect(video.load).not.toHaveBeenCalled();
  });

  it('rewrites only the sources that decode', () => {
    const video = render(
      '<video>' +
        '<source data-edge-cdn="1" src="https://edge.tld/clip.webm">' +
        '<source data-edge-cdn="1" src="https://edge.tld/origin.tld/clip.mp4">' +
      '</video>'
    );
    const [undecodable, decodable] = Array.from(video.querySelectorAll('source'));

    expect(handleMediaFailure(video, createContext())).toBe(true);

    expect(undecodable.src).toBe('https://edge.tld/clip.webm');
    expect(decodable.src).toBe('https://origin.tld/clip.mp4');
    expect(video.load).toHaveBeenCalledTimes(1);
  });

  it('is idempotent', () => {
    const video = render('<video data-edge-cdn="1" src="https://edge.tld/origin.tld/intro.mp4"></video>');
    const context = createContext();

    expect(handleMediaFailure(video, context)).toBe(true);
    expect(handleMediaFailure(video, context)).toBe(false);

    expect(video.src).toBe('https://origin.tld/intro.mp4');
    expect(video.load).toHaveBeenCalledTimes(1);
  });
});

describe('attachMediaHandlers', () => {
  it('ignores media without edge URLs', () => {
    const video = render('<video src="https://videos.example.org/embed.mp4"></video>');

    expect(attachMediaHandlers(video, createContext())).toBe(false);
  });

  it('attaches only once', () => {
    const video = render('<video data-edge-cdn="1" src="https://edge.tld/origin.tld/intro.mp4"></video>');
    const context = createContext();

    expect(attachMediaHandlers(video, context)).toBe(true);
    expect(attachMediaHandlers(video, context)).toBe(false);
  });

  it('falls back on an error of the element itself', () => {
    const video = render('<video data-edge-cdn="1" src="https://edge.tld/origin.tld/intro.mp4"></video>');
    attachMediaHandlers(video, createContext());

    fire(video, 'error');

    expect(video.src).toBe('https://origin.tld/intro.mp4');
  });

  it('waits for the last source to fail', () => {
    const video = render(
      '<video>' +
        '<source data-edge-cdn="1" src="https://edge.tld/origin.tld/clip.webm">' +
        '<source data-edge-cdn="1" src="https://edge.tld/origin.tld/clip.mp4">' +
      '</video>'
    );
    const [first, last] = Array.from(video.querySelectorAll('source'));
    attachMediaHandlers(video, createContext());

    fire(first, 'error');
    expect(getStage(video)).toBe('edge');

    fire(last, 'error');
    expect(getStage(video)).toBe('origin');
    expect(first.src).toBe('https://origin.tld/clip.webm');
    expect(last.src).toBe('https://origin.tld/clip.mp4');
  });

  it('gives up when the origin fails too', () => {
    const video = render('<video data-edge-cdn="1" src="https://edge.tld/origin.tld/intro.mp4"></video>');
    const context = createContext();
    attachMediaHandlers(video, context);

    fire(video, 'error');
    fire(video, 'error');

    expect(getStage(video)).toBe('failed');
    expect(video.src).toBe('https://origin.tld/intro.mp4');
    expect(video.load).toHaveBeenCalledTimes(1);
  });

  it('stops watching once the origin delivered data', () => {
    const video = render('<video data-edge-cdn="1" src="https://edge.tld/origin.tld/intro.mp4"></video>');
    attachMediaHandlers(video, createContext());

    fire(video, 'error');
    fire(video, 'loadeddata');
    fire(video, 'error');

    expect(getStage(video)).toBe('origin');
  });
});
