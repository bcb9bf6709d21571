import { IsOptional, IsString, MaxLength } from 'class-validator';

/** Body for creating (title optional) and renaming (title required, checked by the service) a chat. */
export class ChatTitleDto {
  @IsOptional()
  @IsString()
  @MaxLength(255)
  title?: string;
}
