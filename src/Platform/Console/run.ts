#!/usr/bin/env node
import { ConsoleLogger } from '../Logger.js';
import { OpcodeInspector } from './Inspector.js';

function bootstrap(): number {
    const quiet = process.env.FRAME_ISA_QUIET === '1' || process.env.FRAME_ISA_QUIET === 'true';
    const logger = new ConsoleLogger('frame-isa', quiet);
    const inspector = new OpcodeInspector(logger, line => process.stdout.write(`${line}\n`));
    return inspector.run(process.argv.slice(2));
}

process.exitCode = bootstrap();
