import { Controller, Get } from '@nestjs/common';
import * as packageJson from '../../package.json';

@Controller('probe')
export class ProbeController {
  @Get()
  public probe(): { version: string } {
    return { version: packageJson.version };
  }
}
