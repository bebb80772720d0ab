import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Convo } from './convo';
import type { ChatContext } from './convo';
import { SentAt, gt } from '../lib/convo-filters';
import type { ConvoView, MessageView, Session } from '../types';

const SESSION: Session = {
  did: 'did:plc:me',
  handle: 'me.test',
  accessJwt: 'test-access',
  refreshJwt: 'test-refresh',
};

const CONTEXT: ChatContext = { chatService: 'https://chat.example', session: SESSION };

function view(overrides: Partial<ConvoView> = {}): ConvoView {
  return {
    id: 'convo-1',
    members: [
      { did: 'did:plc:me', handle: 'me.test' },
      { did: 'did:plc:bob', handle: 'bob.test' },
    ],
    lastMessage: { id: 'm9', text: 'see you', sentAt: '2024-06-15T10:30:00.000Z' },
    unreadCount: 2,
    opened: true,
    ...overrides,
  };
}

function message(id: string, sentAt: string): MessageView {
  return { id, text: `message ${id}`, sentAt, sender: { did: 'did:plc:bob' } };
}

describe('Convo', () => {
  let fetchMock: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('exposes the conversation fields', () => {
    const convo = new Convo(view(), CONTEXT);

    expect(convo.id).toBe('convo-1');
    expect(convo.participant).toBe('bob.test');
    expect(convo.unreadCount).toBe(2);
    expect(convo.opened).toBe(true);
    expect(convo.lastMessage).toBe('see you');
    expect(convo.lastMessageTime).toEqual(new Date('2024-06-15T10:30:00.000Z'));
  });

  it('has no participant or last message when empty', () => {
    const convo = new Convo(
      view({ members: [{ did: 'did:plc:me', handle: 'me.test' }], lastMessage: undefined }),
      CONTEXT
    );

    expect(convo.participant).toBeUndefined();
    expect(convo.lastMessage).toBeUndefined();
    expect(convo.lastMessageTime).toBeUndefined();
  });

  it('lists messages', async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(JSON.stringify({ messages: [message('m1', '2024-06-01T08:00:00.000Z')] }))
    );

    const messages = await new Convo(view(), CONTEXT).getMessages();

    expect(fetchMock).toHaveBeenCalledWith(
      'https://chat.example/xrpc/chat.bsky.convo.getMessages?convoId=convo-1',
      expect.objectContaining({ method: 'GET', headers: { Authorization: 'Bearer test-access' } })
    );
    expect(messages).toHaveLength(1);
    expect(messages[0]?.text).toBe('message m1');
    expect(messages[0]?.sentAt).toEqual(new Date('2024-06-01T08:00:00.000Z'));
    expect(messages[0]?.senderDid).toBe('did:plc:bob');
    expect(messages[0]?.convo.id).toBe('convo-1');
  });

  it('filters messages', async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(
        JSON.stringify({
          messages: [
            message('old', '2024-05-31T23:00:00.000Z'),
            message('new', '2024-06-01T01:00:00.000Z'),
          ],
        })
      )
    );

    const messages = await new Convo(view(), CONTEXT).getMessages(gt(SentAt, '2024-06-01'));

    expect(messages.map((m) => m.id)).toEqual(['new']);
  });

  it('sends a message', async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(JSON.stringify(message('m2', '2024-06-15T11:00:00.000Z')))
    );

    const sent = await new Convo(view(), CONTEXT).sendMessage('hello');

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://chat.example/xrpc/chat.bsky.convo.sendMessage');
    expect(JSON.parse(init.body)).toEqual({ convoId: 'convo-1', message: { text: 'hello' } });
    expect(sent.id).toBe('m2');
  });
});
