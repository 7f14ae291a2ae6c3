import { plainToInstance } from 'class-transformer';
import {
  IsEnum,
  IsIn,
  IsOptional,
  IsString,
  IsUrl,
  validateSync,
} from 'class-validator';

enum NodeEnv {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

class EnvironmentVariables {
  @IsEnum(NodeEnv)
  @IsOptional()
  NODE_ENV: NodeEnv = NodeEnv.Development;

  @IsString()
  @IsOptional()
  ATTACHMENT_TEMPFILE_PATH?: string;

  @IsString()
  @IsOptional()
  ATTACHMENT_STORAGE_ROOT?: string;

  @IsString()
  @IsOptional()
  ATTACHMENT_PATH_PREFIX?: string;

  @IsIn(['file_system', 's3'])
  @IsOptional()
  ATTACHMENT_STORAGE?: string;

  @IsUrl({ require_tld: false })
  @IsOptional()
  MINIO_ENDPOINT?: string;

  @IsString()
  @IsOptional()
  MINIO_BUCKET?: string;

  @IsString()
  @IsOptional()
  MINIO_REGION?: string;

  @IsString()
  @IsOptional()
  MINIO_ACCESS_KEY?: string;

  @IsString()
  @IsOptional()
  MINIO_SECRET_KEY?: string;
}

export function validate(config: Record<string, unknown>) {
  const isProd = config.NODE_ENV === 'production';

  // The S3 backend must not fall back to the development credentials in production
  if (isProd && config.ATTACHMENT_STORAGE === 's3') {
    const missing = ['MINIO_ENDPOINT', 'MINIO_BUCKET', 'MINIO_ACCESS_KEY', 'MINIO_SECRET_KEY'].filter(
      (key) => typeof config[key] !== 'string' || config[key] === '',
    );
    if (missing.length > 0) {
      throw new Error(`Missing S3 storage settings in production: ${missing.join(', ')}`);
    }
  }

  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: !isProd,
  });

  if (errors.length > 0) {
    throw new Error(errors.toString());
  }

  return validatedConfig;
}
