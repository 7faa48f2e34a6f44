// Заглушка Telegraf: методы отправки успешно завершаются, пока тест не решит иначе
export function createBotStub() {
  return {
    command: jest.fn(),
    catch: jest.fn(),
    telegram: {
      sendMessage: jest.fn().mockResolvedValue({ message_id: 1 }),
      sendPhoto: jest.fn().mockResolvedValue({ message_id: 1 }),
      sendVideo: jest.fn().mockResolvedValue({ message_id: 1 }),
      sendAudio: jest.fn().mockResolvedValue({ message_id: 1 }),
      sendDocument: jest.fn().mockResolvedValue({ message_id: 1 }),
    },
  };
}

export type BotStub = ReturnType<typeof createBotStub>;
