export { EventService } from './event.service';
export { EventController } from './event.controller';
export { createEventRoutes } from './event.routes';
