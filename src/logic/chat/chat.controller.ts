import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ChatService } from './chat.service';
import { ChatRequestDto } from './dto/chat.dto';

@Controller('chat')
export class ChatController {

    constructor(private readonly chatService: ChatService) {}

    @Post()
    @HttpCode(HttpStatus.OK)
    async chat(@Body() body: ChatRequestDto) {
        const answer = await this.chatService.answer(body.role, body.message, body.history ?? []);
        return { reply: answer.text, outcome: answer.outcome };
    }
}
