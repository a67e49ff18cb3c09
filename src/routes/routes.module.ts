import { Module } from '@nestjs/common';
import { ROUTES_DIR } from '../env';
import { ROUTES_DIRECTORY } from './routes.constants';
import { RoutesController } from './routes.controller';
import { RouteParserService, RouteStoreService } from './services';

@Module({
  controllers: [RoutesController],
  providers: [
    RouteParserService,
    RouteStoreService,
    { provide: ROUTES_DIRECTORY, useValue: ROUTES_DIR },
  ],
  exports: [RouteParserService, RouteStoreService],
})
export class RoutesModule {}
