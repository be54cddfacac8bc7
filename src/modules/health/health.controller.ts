import { Controller, Get } from '@nestjs/common';
import { HealthService } from './health.service';
import { PingResponseDto } from './dto/Ping.response.dto';
import { InfoResponseDto } from './dto/Info.response.dto';

@Controller('api/health')
export class HealthController {
  public constructor(private readonly healthService: HealthService) {}

  @Get('ping')
  public ping(): PingResponseDto {
    return new PingResponseDto(this.healthService.ping());
  }

  @Get('info')
  public async info(): Promise<InfoResponseDto> {
    return new InfoResponseDto(await this.healthService.info());
  }
}
