import { IsIn, IsString } from 'class-validator';
import { MESSAGE_ROLES, type MessageRole } from '../store/store.types';

export class AppendMessageDto {
  @IsIn(MESSAGE_ROLES)
  role!: MessageRole;

  @IsString()
  content!: string;
}
