import { Test, TestingModule } from '@nestjs/testing';
import { MessageRepository } from './message.repository';
import { SUPABASE_ADMIN_CLIENT } from '../../supabase/adminClient';

describe('MessageRepository', () => {
  let repository: MessageRepository;
  let mockSupabase: {
    from: jest.Mock;
    select: jest.Mock;
    insert: jest.Mock;
    eq: jest.Mock;
    order: jest.Mock;
    single: jest.Mock;
  };

  beforeEach(async () => {
    mockSupabase = {
      from: jest.fn().mockReturnThis(),
      select: jest.fn().mockReturnThis(),
      insert: jest.fn().mockReturnThis(),
      eq: jest.fn().mockReturnThis(),
      order: jest.fn(),
      single: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MessageRepository,
        { provide: SUPABASE_ADMIN_CLIENT, useValue: mockSupabase },
      ],
    }).compile();

    repository = module.get<MessageRepository>(MessageRepository);
  });

  it('created_at 昇順、同時刻は msg_id 昇順で取得すること', async () => {
    mockSupabase.order
      .mockReturnValueOnce(mockSupabase)
      .mockResolvedValueOnce({
        data: [
          {
            msg_id: 'msg-001',
            mentorship_id: 'ms-001',
            sender_id: 'mentee-001',
            body: 'first',
            created_at: '2026-01-03T10:00:00+00:00',
          },
        ],
        error: null,
      });

    const messages = await repository.findAllByMentorship('ms-001');

    expect(mockSupabase.from).toHaveBeenCalledWith('message');
    expect(mockSupabase.eq).toHaveBeenCalledWith('mentorship_id', 'ms-001');
    expect(mockSupabase.order).toHaveBeenNthCalledWith(1, 'created_at', {
      ascending: true,
    });
    expect(mockSupabase.order).toHaveBeenNthCalledWith(2, 'msg_id', {
      ascending: true,
    });
    expect(messages[0].created_at).toEqual(new Date('2026-01-03T10:00:00Z'));
  });

  it('取得に失敗した場合エラーを投げること', async () => {
    const dbError = new Error('Database connection failed');
    mockSupabase.order
      .mockReturnValueOnce(mockSupabase)
      .mockResolvedValueOnce({ data: null, error: dbError });

    await expect(repository.findAllByMentorship('ms-001')).rejects.toThrow(
      dbError,
    );
  });

  it('メッセージを挿入して作成した行を返すこと', async () => {
    mockSupabase.single.mockImplementation(async () => ({
      data: {
        ...mockSupabase.insert.mock.calls[0][0],
      },
      error: null,
    }));

    const created = await repository.createMessage({
      mentorshipId: 'ms-001',
      senderId: 'mentor-001',
      body: 'Hello',
    });

    expect(mockSupabase.insert).toHaveBeenCalledWith(
      expect.objectContaining({
        mentorship_id: 'ms-001',
        sender_id: 'mentor-001',
        body: 'Hello',
      }),
    );
    expect(created.body).toBe('Hello');
    expect(created.msg_id).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
    );
  });
});
