import type {
  Metadata,
  MetadataParser,
  MetadataTextSource,
} from '../../../domain/dmi-metadata/index.js';

import { AppError } from '../../../shared/errors/app-error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';

import type { ParseMetadataCommand } from '../commands/parse-metadata.command.js';
import {
  parseMetadataCommandSchema,
  type MetadataSourcePayload,
  type ParseMetadataPayload,
} from '../dto/parse-metadata.dto.js';

export class ParseMetadataHandler {
  private readonly logger = createChildLogger({ module: 'ParseMetadataHandler' });

  public constructor(
    private readonly parser: MetadataParser,
    private readonly textSource?: MetadataTextSource,
  ) {}

  public async execute(command: ParseMetadataCommand): Promise<Metadata> {
    const payload = this.validate(command.payload);

    this.logger.info({ requestId: payload.id, source: payload.source.type }, 'Parsing DMI metadata');

    try {
      const text = await this.resolveText(payload.id, payload.source);
      const metadata = this.parser.parse(text);

      this.logger.info(
        {
          requestId: payload.id,
          width: metadata.header.width,
          height: metadata.header.height,
          states: metadata.states.length,
        },
        'DMI metadata parsed',
      );

      return metadata;
    } catch (error) {
      this.logger.error({ requestId: payload.id, error }, 'DMI metadata parsing failed');
      throw AppError.fromUnknown(error, 'dmi-metadata.failure');
    }
  }

  private async resolveText(id: string, source: MetadataSourcePayload): Promise<string> {
    switch (source.type) {
      case 'text':
        return source.text;
      case 'container': {
        if (!this.textSource) {
          throw AppError.unsupported(
            'dmi-metadata.unsupported-source',
            'No container reader is configured to extract metadata text',
            { requestId: id, uri: source.uri },
          );
        }

        return this.textSource.readMetadataText(source.uri);
      }
      default: {
        const exhaustive: never = source;
        throw AppError.unsupported('dmi-metadata.unsupported-source', 'Unknown metadata source', {
          source: exhaustive,
        });
      }
    }
  }

  private validate(payload: ParseMetadataPayload): ParseMetadataPayload {
    const parsed = parseMetadataCommandSchema.safeParse(payload);

    if (!parsed.success) {
      const error = AppError.validation('dmi-metadata.invalid-payload', {
        issues: parsed.error.issues,
      });
      this.logger.warn({ issues: parsed.error.issues }, 'Invalid parse payload received');
      throw error;
    }

    return parsed.data;
  }
}
