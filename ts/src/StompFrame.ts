// STOMP Frame representation
export interface StompFrame {
  command: string;
  headers: Record<string, string>;
  body: string;
}

// Result of splitting a receive buffer on frame terminators
export interface SplitFrames {
  frames: string[];
  rest: string;
}

export const STOMP_ACCEPT_VERSION = '1.1,1.2';
export const STOMP_HEARTBEAT_EOL = '\n';

const ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '\n': '\\n',
  '\r': '\\r',
  ':': '\\c',
};

const UNESCAPES: Record<string, string> = {
  '\\\\': '\\',
  '\\n': '\n',
  '\\r': '\r',
  '\\c': ':',
};

export class StompFrameUtils {
  static escapeHeader(value: string): string {
    return value.replace(/[\\\n\r:]/g, (char) => ESCAPES[char] ?? char);
  }

  static unescapeHeader(value: string): string {
    return value.replace(/\\[\\nrc]/g, (sequence) => UNESCAPES[sequence] ?? sequence);
  }

  static parse(frameData: string): StompFrame | null {
    // Heart-beats are bare EOLs between frames
    const trimmed = frameData.replace(/^(\r?\n)+/, '');
    if (trimmed.length === 0) return null;

    const lines = trimmed.split('\n');
    const command = lines[0].replace(/\r$/, '').trim();
    if (command.length === 0) return null;

    const headers: Record<string, string> = {};
    let bodyStart = lines.length;

    // Parse headers
    for (let i = 1; i < lines.length; i++) {
      const line = lines[i].replace(/\r$/, '');
      if (line.length === 0) {
        bodyStart = i + 1;
        break;
      }
      const colonIndex = line.indexOf(':');
      if (colonIndex !== -1) {
        const key = StompFrameUtils.unescapeHeader(line.substring(0, colonIndex));
        const value = StompFrameUtils.unescapeHeader(line.substring(colonIndex + 1));
        // Repeated headers: only the first one counts
        if (!(key in headers)) {
          headers[key] = value;
        }
      }
    }

    let body = lines.slice(bodyStart).join('\n');

    // Remove null terminator if present
    if (body.endsWith('\0')) {
      body = body.substring(0, body.length - 1);
    }

    return { command, headers, body };
  }

  static serialize(frame: StompFrame): string {
    let result = frame.command + '\n';
    // CONNECT headers are never escaped
    const escape = frame.command === 'CONNECT'
      ? (value: string) => value
      : StompFrameUtils.escapeHeader;

    for (const [key, value] of Object.entries(frame.headers)) {
      result += `${escape(key)}:${escape(value)}\n`;
    }

    result += '\n';

    if (frame.body.length > 0) {
      result += frame.body;
    }

    result += '\0';

    return result;
  }

  static split(buffer: string): SplitFrames {
    const frames: string[] = [];
    let rest = buffer;
    let nullIndex: number;
    while ((nullIndex = rest.indexOf('\0')) !== -1) {
      const frameData = rest.substring(0, nullIndex);
      rest = rest.substring(nullIndex + 1);
      if (frameData.trim().length > 0) {
        frames.push(frameData);
      }
    }
    return { frames, rest };
  }

  // Client-side frame builders
  static connect(host: string, headers: Record<string, string> = {}): StompFrame {
    return {
      command: 'CONNECT',
      headers: {
        'accept-version': STOMP_ACCEPT_VERSION,
        host,
        'heart-beat': '0,0',
        ...headers,
      },
      body: '',
    };
  }

  static subscribe(destination: string, subscriptionId: string): StompFrame {
    return {
      command: 'SUBSCRIBE',
      headers: { destination, id: subscriptionId, ack: 'auto' },
      body: '',
    };
  }

  static unsubscribe(subscriptionId: string): StompFrame {
    return {
      command: 'UNSUBSCRIBE',
      headers: { id: subscriptionId },
      body: '',
    };
  }

  static send(destination: string, body: string, contentType?: string): StompFrame {
    const headers: Record<string, string> = { destination };
    if (contentType) headers['content-type'] = contentType;
    headers['content-length'] = String(Buffer.byteLength(body, 'utf8'));
    return { command: 'SEND', headers, body };
  }

  static disconnect(receipt?: string): StompFrame {
    return { command: 'DISCONNECT', headers: receipt ? { receipt } : {}, body: '' };
  }
}
