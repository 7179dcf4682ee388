import { FastifyInstance } from 'fastify';
import { RunSimulationSchema } from '../schemas/simulation.schema.js';
import { SimulationService, simulationService } from '../services/simulation.service.js';

export interface SimulationsRoutesOptions {
  service?: SimulationService;
}

export async function simulationsRoutes(
  fastify: FastifyInstance,
  opts: SimulationsRoutesOptions = {},
): Promise<void> {
  const service = opts.service ?? simulationService;

  // GET /api/simulations/defaults - studio line-up and workflow used when a scenario omits them
  fastify.get('/api/simulations/defaults', async (request, reply) => {
    return reply.code(200).send(service.defaults());
  });

  // POST /api/simulations - run a scenario to its horizon
  fastify.post('/api/simulations', async (request, reply) => {
    const input = RunSimulationSchema.parse(request.body);
    const output = service.run(input, request.log);
    return reply.code(200).send(output);
  });
}
