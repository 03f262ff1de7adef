// swagger configuration file
import { DocumentBuilder } from '@nestjs/swagger';
export const swaggerConfig = new DocumentBuilder()
  .setTitle('Support Query Router API')
  .setDescription(
    'Routes support questions to knowledge-base answers, direct answers or greetings',
  )
  .setVersion('1.0')
  .build();
