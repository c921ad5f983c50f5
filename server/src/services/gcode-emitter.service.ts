import * as path from 'path';
import { OperationClass } from '../models/geometry.types';
import {
  EventConsumer,
  PathCompleteEvent,
  PathStartEvent,
  PipelineEvent,
  PipelineEventType,
  PointAddedEvent,
} from '../models/path-event.types';
import { ReadonlyWelderConfig } from '../config/welder.config';
import { EventSequenceError, FilenameTooLongError } from '../errors/conversion.errors';
import { GcodeSink } from './gcode-sink.service';
import { SequenceGuard } from './event-log.service';

export type EmitterPhase = 'uninitialized' | 'header_written' | 'idle' | 'in_path' | 'finalized';

export interface EmissionSummary {
  outputName: string;
  pathsProcessed: number;
  pointsProcessed: number;
  bytesWritten: number;
}

export const DEFAULT_STOP_MESSAGE = 'Paused';
export const DEFAULT_PIPETTE_MESSAGE = 'Pipette filling required';

const PIPETTE_HEIGHT = 0.05;
const PIPETTE_DWELL_MS = 500;

/** Numbers as the firmware reads them: at most 3 decimals, no trailing zeros */
function fmt(value: number): string {
  return Number(value.toFixed(3)).toString();
}

/**
 * Pass-2 consumer. Turns the offset-corrected event stream into G-code and
 * owns the sink for the whole run.
 *
 * `run()` is the only way to drive it: the output name is checked before
 * the sink is opened, the header is written, the caller feeds events, and the
 * sink is closed on every exit path.
 */
export class GcodeEmitter implements EventConsumer {
  readonly subscriptions: ReadonlySet<PipelineEventType> = new Set<PipelineEventType>([
    'path_start',
    'point_added',
    'path_complete',
    'processing_complete',
  ]);

  private phase: EmitterPhase = 'uninitialized';
  private readonly guard = new SequenceGuard();
  private currentPath: PathStartEvent | null = null;
  private isFirstPointEver = true;
  private isFirstPointInPath = false;
  private pathsProcessed = 0;
  private pointsProcessed = 0;

  constructor(
    private readonly sink: GcodeSink,
    private readonly config: ReadonlyWelderConfig
  ) {}

  get outputName(): string {
    return path.basename(this.sink.name);
  }

  getPhase(): EmitterPhase {
    return this.phase;
  }

  getSummary(): EmissionSummary {
    return {
      outputName: this.outputName,
      pathsProcessed: this.pathsProcessed,
      pointsProcessed: this.pointsProcessed,
      bytesWritten: this.sink.bytesWritten,
    };
  }

  /**
   * Open the sink, write the header, let `feed` deliver the event stream
   * (ending with `processing_complete`) and close the sink.
   */
  run(feed: (consumer: EventConsumer) => void): EmissionSummary {
    if (this.phase !== 'uninitialized') {
      throw new EventSequenceError(`Emitter for '${this.outputName}' has already run`);
    }

    this.validateOutputName();
    this.sink.open();
    try {
      this.writeHeader();
      this.phase = 'header_written';

      feed(this);

      if (this.getPhase() !== 'finalized') {
        throw new EventSequenceError('Event stream ended without processing_complete');
      }
    } finally {
      if (this.sink.isOpen) {
        if (this.getPhase() !== 'finalized') {
          console.error(`[GcodeEmitter] Run for ${this.outputName} failed, closing output`);
        }
        this.closeSink();
      }
    }

    console.log(
      `[GcodeEmitter] Finalized ${this.outputName}: ${this.pathsProcessed} paths, ${this.pointsProcessed} points`
    );
    return this.getSummary();
  }

  handle(event: PipelineEvent): void {
    if (this.phase === 'uninitialized') {
      throw new EventSequenceError(`Received ${event.type} before the header was written`);
    }
    if (this.phase === 'finalized') {
      if (event.type === 'processing_complete') return;
      throw new EventSequenceError(`Received ${event.type} after output was finalized`);
    }

    this.guard.check(event);

    switch (event.type) {
      case 'path_start':
        this.startPath(event);
        break;
      case 'point_added':
        this.addPoint(event);
        break;
      case 'path_complete':
        this.completePath(event);
        break;
      case 'processing_complete':
        this.finalize();
        break;
      default: {
        const unreachable: never = event;
        throw new EventSequenceError(`Unknown event: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private validateOutputName(): void {
    const name = this.outputName;
    const limit = this.config.output.maxFilenameLength;
    if (name.length > limit) {
      throw new FilenameTooLongError(name, name.length, limit);
    }
  }

  private line(text = ''): void {
    this.sink.write(`${text}\n`);
  }

  private writeHeader(): void {
    const { temperatures, printer, sequence } = this.config;

    this.line('; Generated by weld-gcode-server');
    this.line('; Plastic welding G-code');
    this.line(`; Output file: ${this.outputName}`);
    this.line(';');
    this.line('; Process overview:');
    this.line('; 1. Home and heat');
    this.line('; 2. Pause for plastic sheet insertion');
    this.line('; 3. Execute welding sequence');
    this.line('; 4. Raise, home and finish');
    this.line(';');
    this.line(`; Bed temperature: ${fmt(temperatures.bedTemperature)}°C`);
    this.line(`; Nozzle temperature: ${fmt(temperatures.nozzleTemperature)}°C`);
    this.line();

    this.line('; Printer initialization');
    this.line('G90 ; Absolute positioning');
    this.line('M83 ; Relative extrusion');
    this.line('G28 ; Home all axes');
    this.line();

    if (temperatures.heatingEnabled) {
      const bed = fmt(temperatures.bedTemperature);
      const nozzle = fmt(temperatures.nozzleTemperature);
      this.line('; Heat bed and nozzle');
      this.line(`M140 S${bed} ; Set bed temperature`);
      this.line(`M190 S${bed} ; Wait for bed temperature`);
      this.line(`M104 S${nozzle} ; Set nozzle temperature`);
      this.line(`M109 S${nozzle} ; Wait for nozzle temperature`);
      this.line();
    }

    if (printer.enableBedLeveling) {
      this.line('G29 ; Auto bed leveling');
      this.line();
    }

    if (temperatures.useChamberHeating) {
      this.line(`M141 S${fmt(temperatures.chamberTemperature)} ; Set chamber temperature`);
      this.line();
    }

    if (sequence.includeUserPause) {
      this.line('; Pause for operator to insert plastic sheets');
      this.line(`M117 ${sequence.userPauseMessage}`);
      this.line('M0 ; Pause for operator');
      this.line('M117 Starting welding sequence...');
      this.line();
    }
  }

  private startPath(event: PathStartEvent): void {
    this.currentPath = event;
    this.isFirstPointInPath = true;
    this.phase = 'in_path';
    this.line(`; Starting path: ${event.id} (${event.operation})`);
    if (event.pass !== undefined && event.pass > 1) {
      this.writePassCooling(event.operation, event.pass);
    }
  }

  private writePassCooling(operation: OperationClass, pass: number): void {
    if (operation !== 'normal' && operation !== 'frangible') return;
    const settings = operation === 'normal' ? this.config.normalWelds : this.config.frangibleWelds;
    const seconds = settings.coolingTimeBetweenPasses;
    if (seconds <= 0) return;
    this.line(`G4 P${Math.round(seconds * 1000)} ; Cool for ${fmt(seconds)}s before pass ${pass}`);
  }

  private addPoint(event: PointAddedEvent): void {
    const { movement } = this.config;
    const xy = `X${event.x.toFixed(3)} Y${event.y.toFixed(3)} F${fmt(movement.xySpeed)}`;

    if (this.isFirstPointEver) {
      this.writeCompressionOffset();
      this.line(`G1 Z${fmt(movement.moveHeight)} F${fmt(movement.zSpeed)} ; Move to high travel height`);
      this.line(`G1 ${xy} ; Move to start of welding`);
      this.isFirstPointEver = false;
      this.isFirstPointInPath = false;
    } else if (this.isFirstPointInPath) {
      this.line(`G1 ${xy} ; Move to start of path`);
      this.isFirstPointInPath = false;
    } else {
      this.line(`G1 ${xy} ; Move to next point`);
    }

    this.writeOperation(event.operation);
    this.pointsProcessed++;
  }

  private writeCompressionOffset(): void {
    const { weldCompressionOffset, zSpeed } = this.config.movement;
    if (weldCompressionOffset === 0) return;

    this.line('; Apply Z offset for weld compression');
    this.line(`G1 Z0 F${fmt(zSpeed)} ; Move to Z=0 for relative offset`);
    this.line(`G92 Z${fmt(weldCompressionOffset)} ; Set Z offset for weld compression`);
  }

  private writeOperation(operation: OperationClass): void {
    const { lowTravelHeight, zSpeed } = this.config.movement;
    const raise = `G1 Z${fmt(lowTravelHeight)} F${fmt(zSpeed)} ; Raise to low travel height`;

    switch (operation) {
      case 'normal':
      case 'frangible': {
        const settings = operation === 'normal' ? this.config.normalWelds : this.config.frangibleWelds;
        const label = operation === 'normal' ? 'weld' : 'frangible weld';
        this.line(`G1 Z${fmt(settings.operationHeight)} F${fmt(zSpeed)} ; Lower to ${label} height`);
        this.line(`G4 P${Math.round(settings.operationDuration * 1000)} ; Dwell for ${fmt(settings.operationDuration)}s`);
        this.line(raise);
        break;
      }
      case 'stop':
        this.line(`M117 ${this.currentPath?.pauseMessage ?? DEFAULT_STOP_MESSAGE}`);
        this.line('M0 ; Pause for user interaction');
        break;
      case 'pipette':
        this.line('; Pipette operation point');
        this.line(`M117 ${this.currentPath?.pauseMessage ?? DEFAULT_PIPETTE_MESSAGE}`);
        this.line(`G1 Z${fmt(PIPETTE_HEIGHT)} F${fmt(zSpeed)} ; Lower for pipette`);
        this.line(`G4 P${PIPETTE_DWELL_MS} ; Brief pause`);
        this.line(raise);
        break;
      default: {
        const unreachable: never = operation;
        throw new EventSequenceError(`Unknown operation class: ${String(unreachable)}`);
      }
    }
  }

  private completePath(event: PathCompleteEvent): void {
    this.line(`; Completed path: ${event.id}`);
    this.line();
    this.sink.flush();
    this.currentPath = null;
    this.pathsProcessed++;
    this.phase = 'idle';
  }

  private finalize(): void {
    const { temperatures, movement } = this.config;

    this.line('; End of welding sequence');
    this.line(`; Total paths processed: ${this.pathsProcessed}`);
    this.line(`; Total points processed: ${this.pointsProcessed}`);
    this.line();

    this.line('; End sequence');
    this.line(`G1 Z${fmt(movement.endRaiseHeight)} F${fmt(movement.zSpeed)} ; Raise nozzle`);
    this.line('G28 X Y ; Home X and Y axes');
    if (temperatures.enableCooldown) {
      const cooldown = fmt(temperatures.cooldownTemperature);
      this.line(`M104 S${cooldown} ; Cool nozzle to ${cooldown}°C`);
      this.line(`M140 S${cooldown} ; Cool bed to ${cooldown}°C`);
    }
    if (temperatures.useChamberHeating) {
      this.line('M141 S0 ; Turn off chamber heating');
    }
    this.line('M107 ; Turn off part cooling fan');
    this.line('M84 ; Disable steppers');
    this.line('; End of G-code');

    this.closeSink();
    this.phase = 'finalized';
  }

  private closeSink(): void {
    this.sink.close();
  }
}
