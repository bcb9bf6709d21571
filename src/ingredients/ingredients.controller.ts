import {
  BadRequestException,
  Controller,
  Delete,
  Get,
  Post,
  StreamableFile,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { AuthUser, CurrentUser } from '../common/decorators/current-user.decorator';
import { IngredientsService } from './ingredients.service';

@Controller('ingredients')
@UseGuards(JwtAuthGuard)
export class IngredientsController {
  constructor(private readonly ingredientsService: IngredientsService) {}

  @Get()
  list(@CurrentUser() user: AuthUser) {
    return this.ingredientsService.list(user.userId);
  }

  @Get('count')
  async count(@CurrentUser() user: AuthUser) {
    return { count: await this.ingredientsService.count(user.userId) };
  }

  /** POST /ingredients/upload (multipart, field "file"). Replaces the caller's whole table. */
  @Post('upload')
  @UseInterceptors(FileInterceptor('file', { limits: { fileSize: 5 * 1024 * 1024 } }))
  async upload(
    @CurrentUser() user: AuthUser,
    @UploadedFile() file: Express.Multer.File | undefined,
  ) {
    if (!file) throw new BadRequestException('CSV file is required (form field "file")');
    const count = await this.ingredientsService.importCsv(user.userId, file.originalname, file.buffer);
    return { message: `Successfully uploaded ${count} ingredients`, count };
  }

  @Get('download')
  async download(@CurrentUser() user: AuthUser) {
    const csv = await this.ingredientsService.exportCsv(user.userId);
    return new StreamableFile(Buffer.from(csv, 'utf-8'), {
      type: 'text/csv',
      disposition: 'attachment; filename="ingredients.csv"',
    });
  }

  @Delete()
  async clear(@CurrentUser() user: AuthUser) {
    return { count: await this.ingredientsService.clear(user.userId) };
  }
}
