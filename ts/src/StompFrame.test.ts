import { describe, expect, it } from 'vitest';
import { StompFrameUtils } from './StompFrame.js';

describe('StompFrameUtils.parse', () => {
  it('parses command, headers and body', () => {
    const frame = StompFrameUtils.parse('MESSAGE\ndestination:/topic/x\nmessage-id:7\n\n{"kind":"ping"}');

    expect(frame).toEqual({
      command: 'MESSAGE',
      headers: { destination: '/topic/x', 'message-id': '7' },
      body: '{"kind":"ping"}',
    });
  });

  it('returns null for heart-beats', () => {
    expect(StompFrameUtils.parse('\n')).toBeNull();
    expect(StompFrameUtils.parse('\r\n\r\n')).toBeNull();
  });

  it('skips heart-beats before a frame and accepts CRLF lines', () => {
    const frame = StompFrameUtils.parse('\n\nCONNECTED\r\nversion:1.2\r\n\r\n');

    expect(frame).toEqual({ command: 'CONNECTED', headers: { version: '1.2' }, body: '' });
  });

  it('unescapes header values and keeps the first repeated header', () => {
    const frame = StompFrameUtils.parse('ERROR\nmessage:bad\\cinput\\nline\nmessage:second\n\ndetails');

    expect(frame?.headers['message']).toBe('bad:input\nline');
    expect(frame?.body).toBe('details');
  });

  it('parses a frame without a body separator', () => {
    expect(StompFrameUtils.parse('RECEIPT\nreceipt-id:disconnect-1')).toEqual({
      command: 'RECEIPT',
      headers: { 'receipt-id': 'disconnect-1' },
      body: '',
    });
  });
});

describe('StompFrameUtils.serialize', () => {
  it('writes headers, a blank line, the body and the terminator', () => {
    const serialized = StompFrameUtils.serialize(StompFrameUtils.send('/queue/a', 'hi', 'text/plain'));

    expect(serialized).toBe('SEND\ndestination:/queue/a\ncontent-type:text/plain\ncontent-length:2\n\nhi\0');
  });

  it('escapes header values except on CONNECT', () => {
    expect(StompFrameUtils.serialize(StompFrameUtils.subscribe('/topic/a:b', 'sub-1'))).toBe(
      'SUBSCRIBE\ndestination:/topic/a\\cb\nid:sub-1\nack:auto\n\n\0'
    );
    expect(StompFrameUtils.serialize(StompFrameUtils.connect('localhost', { passcode: 'a:b' }))).toBe(
      'CONNECT\naccept-version:1.1,1.2\nhost:localhost\nheart-beat:0,0\npasscode:a:b\n\n\0'
    );
  });

  it('counts content-length in bytes', () => {
    expect(StompFrameUtils.send('/queue/a', 'ü').headers['content-length']).toBe('2');
  });

  it('adds a receipt to DISCONNECT when asked', () => {
    expect(StompFrameUtils.disconnect('disconnect-1')).toEqual({
      command: 'DISCONNECT',
      headers: { receipt: 'disconnect-1' },
      body: '',
    });
    expect(StompFrameUtils.disconnect().headers).toEqual({});
  });
});

describe('StompFrameUtils.split', () => {
  it('returns complete frames and keeps the partial rest', () => {
    const { frames, rest } = StompFrameUtils.split('RECEIPT\nreceipt-id:1\n\n\0\nMESSAGE\ndestination:/a');

    expect(frames).toEqual(['RECEIPT\nreceipt-id:1\n\n']);
    expect(rest).toBe('\nMESSAGE\ndestination:/a');
  });

  it('drops empty segments between terminators', () => {
    expect(StompFrameUtils.split('\0\n\0').frames).toEqual([]);
  });
});
