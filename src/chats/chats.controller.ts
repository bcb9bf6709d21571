import { Body, Controller, Delete, Get, Param, Patch, Post, UseGuards } from '@nestjs/common';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { AuthUser, CurrentUser } from '../common/decorators/current-user.decorator';
import { ChatsService } from './chats.service';
import { ChatTitleDto } from './dto/chat-title.dto';
import { SendMessageDto } from './dto/send-message.dto';

@Controller('chats')
@UseGuards(JwtAuthGuard)
export class ChatsController {
  constructor(private readonly chatsService: ChatsService) {}

  @Get()
  list(@CurrentUser() user: AuthUser) {
    return this.chatsService.list(user.userId);
  }

  @Post()
  create(@CurrentUser() user: AuthUser, @Body() body: ChatTitleDto) {
    return this.chatsService.create(user.userId, body.title);
  }

  /** Chat with its full message history. */
  @Get(':id')
  get(@CurrentUser() user: AuthUser, @Param('id') id: string) {
    return this.chatsService.get(user.userId, id);
  }

  @Patch(':id')
  rename(@CurrentUser() user: AuthUser, @Param('id') id: string, @Body() body: ChatTitleDto) {
    return this.chatsService.rename(user.userId, id, body.title);
  }

  @Delete(':id')
  async delete(@CurrentUser() user: AuthUser, @Param('id') id: string) {
    await this.chatsService.delete(user.userId, id);
    return { status: 'ok' };
  }

  @Get(':id/messages')
  listMessages(@CurrentUser() user: AuthUser, @Param('id') id: string) {
    return this.chatsService.listMessages(user.userId, id);
  }

  /**
   * POST /chats/:id/messages
   * Sends the message with the caller's ingredient and macro context to the model,
   * stores both turns and returns them.
   */
  @Post(':id/messages')
  sendMessage(
    @CurrentUser() user: AuthUser,
    @Param('id') id: string,
    @Body() body: SendMessageDto,
  ) {
    return this.chatsService.sendMessage(user.userId, id, body.content);
  }
}
