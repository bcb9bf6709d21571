import { InternalServerErrorException } from '@nestjs/common';

/** The external chat-completions call failed or returned nothing usable. */
export class ChatGatewayException extends InternalServerErrorException {
  constructor(message = 'The assistant is unavailable right now. Please try again.') {
    super(message);
  }
}
