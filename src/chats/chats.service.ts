import { BadRequestException, Injectable, NotFoundException } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { ClientSession, isValidObjectId, Model } from 'mongoose';
import { TransactionService, withSession } from '../common/database/transaction.service';
import { IngredientsService } from '../ingredients/ingredients.service';
import { SettingsService } from '../settings/settings.service';
import { LlmService } from '../llm/llm.service';
import { ChatSession, DEFAULT_CHAT_TITLE } from './schemas/chat-session.schema';
import { Message, MessageRole } from './schemas/message.schema';

export interface ChatView {
  id: string;
  title: string;
  created_at: Date | null;
  updated_at: Date | null;
}

export interface MessageView {
  id: string;
  chat_id: string;
  role: MessageRole;
  content: string;
  created_at: Date | null;
}

export interface ChatDetailView extends ChatView {
  messages: MessageView[];
}

export interface SendMessageResult {
  chat_id: string;
  user_message: string;
  assistant_message: string;
}

function toChatView(chat: ChatSession): ChatView {
  return {
    id: String(chat._id),
    title: chat.title,
    created_at: chat.createdAt ?? null,
    updated_at: chat.updatedAt ?? null,
  };
}

function toMessageView(message: Message): MessageView {
  return {
    id: String(message._id),
    chat_id: message.chatId,
    role: message.role,
    content: message.content,
    created_at: message.createdAt ?? null,
  };
}

/**
 * Chat sessions and their messages, always scoped to the owning user.
 * A chat owned by someone else is reported exactly like a missing one.
 */
@Injectable()
export class ChatsService {
  constructor(
    @InjectModel(ChatSession.name) private readonly chatModel: Model<ChatSession>,
    @InjectModel(Message.name) private readonly messageModel: Model<Message>,
    private readonly transactions: TransactionService,
    private readonly ingredientsService: IngredientsService,
    private readonly settingsService: SettingsService,
    private readonly llmService: LlmService,
  ) {}

  /** Newest activity first. */
  async list(userId: string): Promise<ChatView[]> {
    const chats = await this.chatModel
      .find({ userId })
      .sort({ updatedAt: -1, _id: -1 })
      .exec();
    return chats.map(toChatView);
  }

  private async findOwned(userId: string, chatId: string): Promise<ChatSession> {
    if (!isValidObjectId(chatId)) throw new NotFoundException('Chat not found');
    const chat = await this.chatModel.findOne({ _id: chatId, userId }).exec();
    if (!chat) throw new NotFoundException('Chat not found');
    return chat;
  }

  private async findMessages(chatId: string): Promise<Message[]> {
    return this.messageModel.find({ chatId }).sort({ createdAt: 1, _id: 1 }).exec();
  }

  async get(userId: string, chatId: string): Promise<ChatDetailView> {
    const chat = await this.findOwned(userId, chatId);
    const messages = await this.findMessages(String(chat._id));
    return { ...toChatView(chat), messages: messages.map(toMessageView) };
  }

  async create(userId: string, title?: string): Promise<ChatView> {
    const chat = await this.chatModel.create({
      userId,
      title: title?.trim() || DEFAULT_CHAT_TITLE,
    });
    return toChatView(chat);
  }

  async rename(userId: string, chatId: string, title: string | undefined): Promise<ChatView> {
    const trimmed = title?.trim();
    if (!trimmed) throw new BadRequestException('Title is required');
    if (!isValidObjectId(chatId)) throw new NotFoundException('Chat not found');
    const chat = await this.chatModel
      .findOneAndUpdate({ _id: chatId, userId }, { $set: { title: trimmed } }, { new: true })
      .exec();
    if (!chat) throw new NotFoundException('Chat not found');
    return toChatView(chat);
  }

  async delete(userId: string, chatId: string): Promise<void> {
    const chat = await this.findOwned(userId, chatId);
    await this.transactions.run(async (session) => {
      await this.messageModel.deleteMany({ chatId: String(chat._id) }).session(session).exec();
      await this.chatModel.deleteOne({ _id: chat._id, userId }).session(session).exec();
    });
  }

  async listMessages(userId: string, chatId: string): Promise<MessageView[]> {
    const chat = await this.findOwned(userId, chatId);
    return (await this.findMessages(String(chat._id))).map(toMessageView);
  }

  /**
   * Ask the assistant and record the exchange. The model is called first; the user
   * message and the reply are then stored together, so a failed call leaves no half turn.
   */
  async sendMessage(userId: string, chatId: string, content: string): Promise<SendMessageResult> {
    if (!content.trim()) throw new BadRequestException('Message content is required');
    const chat = await this.findOwned(userId, chatId);
    const id = String(chat._id);

    const [history, ingredients, settings] = await Promise.all([
      this.findMessages(id),
      this.ingredientsService.listFacts(userId),
      this.settingsService.getMacroTargets(userId),
    ]);
    // New turns always sort after the stored ones, even within the same millisecond
    const last = history.length > 0 ? history[history.length - 1] : undefined;
    const lastAt = last?.createdAt?.getTime() ?? 0;
    const receivedAt = new Date(Math.max(Date.now(), lastAt + 1));
    const reply = await this.llmService.reply(
      history.map((m) => ({ role: m.role, content: m.content })),
      content,
      { ingredients, settings },
    );

    const repliedAt = new Date(Math.max(Date.now(), receivedAt.getTime() + 1));
    await this.transactions.run(async (session) => {
      await this.appendMessage(chat, 'user', content, receivedAt, session);
      await this.appendMessage(chat, 'assistant', reply, repliedAt, session);
    });
    return { chat_id: id, user_message: content, assistant_message: reply };
  }

  /** Insert one message and move the chat's updatedAt forward to it, never backwards. */
  private async appendMessage(
    chat: ChatSession,
    role: MessageRole,
    content: string,
    at: Date,
    session: ClientSession | null,
  ): Promise<Message> {
    const [message] = await this.messageModel.create(
      [{ chatId: String(chat._id), role, content, createdAt: at }],
      withSession(session),
    );
    await this.chatModel
      .updateOne({ _id: chat._id }, { $max: { updatedAt: at } }, { timestamps: false })
      .session(session)
      .exec();
    return message;
  }

  /** Part of the account-deletion cascade: every chat of the user and their messages. */
  async deleteAllForUser(userId: string, session: ClientSession | null): Promise<number> {
    const chats = await this.chatModel.find({ userId }).session(session).exec();
    const chatIds = chats.map((c) => String(c._id));
    if (chatIds.length > 0) {
      await this.messageModel.deleteMany({ chatId: { $in: chatIds } }).session(session).exec();
    }
    const result = await this.chatModel.deleteMany({ userId }).session(session).exec();
    return result.deletedCount;
  }
}
