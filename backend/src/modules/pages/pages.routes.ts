import type { FastifyInstance } from 'fastify';
import type { PagesController } from './pages.controller';

export function registerPagesRoutes(app: FastifyInstance, controller: PagesController) {
  app.get('/', controller.home.bind(controller));
  app.get('/teachers', controller.teachers.bind(controller));
  app.get('/students', controller.students.bind(controller));
}
