import { v4 as uuidv4 } from 'uuid';
import type { EnvironmentalReadingRepositoryPort, EnvironmentalSample } from '@evsim/domain';

/** The slice of a neo4j transaction the repository needs. */
export interface CypherRunner {
  run(query: string, parameters?: Record<string, unknown>): PromiseLike<unknown>;
}

/** The slice of a neo4j `Session` the repository needs. */
export interface GraphSession {
  executeWrite<T>(work: (tx: CypherRunner) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export type GraphSessionFactory = () => GraphSession;

const CREATE_READING = `
  CREATE (e:EnvironmentalData $props)
  CREATE (t:Timestamp {
    value: $ts,
    year: $year,
    month: $month,
    day: $day,
    hour: $hour,
    minute: $minute
  })
  CREATE (e)-[:MEASURED_AT]->(t)
`;

/**
 * Stores each reading as an `EnvironmentalData` node linked `MEASURED_AT`
 * to its own `Timestamp` node, in a single write transaction.
 */
export class Neo4jEnvironmentalReadingRepository implements EnvironmentalReadingRepositoryPort {
  constructor(private readonly openSession: GraphSessionFactory) {}

  async save(sample: EnvironmentalSample): Promise<string> {
    const id = uuidv4();
    const ts = sample.timestamp;
    const props: Record<string, unknown> = {
      id,
      temperature: sample.temperature,
      pressure: sample.pressure,
      humidity: sample.humidity,
      heatStable: sample.heatStable,
    };
    if (sample.gasResistance !== undefined) props['gasResistance'] = sample.gasResistance;

    const session = this.openSession();
    try {
      await session.executeWrite(async (tx) => {
        await tx.run(CREATE_READING, {
          props,
          ts: ts.toISOString(),
          year: ts.getUTCFullYear(),
          month: ts.getUTCMonth() + 1,
          day: ts.getUTCDate(),
          hour: ts.getUTCHours(),
          minute: ts.getUTCMinutes(),
        });
      });
    } finally {
      await session.close();
    }
    return id;
  }
}
