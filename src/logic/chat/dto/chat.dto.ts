import { Type } from 'class-transformer';
import { IsArray, IsIn, IsNotEmpty, IsOptional, IsString, ValidateNested } from 'class-validator';

export class ConversationTurn {
    @IsIn(['user', 'assistant'])
    role!: 'user' | 'assistant';

    @IsString()
    text!: string;
}

export class ChatRequestDto {
    @IsString()
    role!: string;

    @IsString()
    @IsNotEmpty({ message: 'No message provided' })
    message!: string;

    @IsOptional()
    @IsArray()
    @ValidateNested({ each: true })
    @Type(() => ConversationTurn)
    history?: ConversationTurn[];
}
