import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { RankRequestDto, RankingResponseDto } from '@libs/models';

import { RankingService } from './ranking.service';

@ApiTags('Search')
@Controller('api/v1/search')
export class RankingController {
  public constructor(private readonly rankingService: RankingService) {}

  @Post('rank')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Re-rank a pool of retrieved listings against a parsed search intent' })
  @ApiResponse({ status: 200, description: 'Ranked listings', type: RankingResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid body or candidate pool too large' })
  public rank(@Body() body: RankRequestDto): Promise<RankingResponseDto> {
    return this.rankingService.rank(body);
  }
}
