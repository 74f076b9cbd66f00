/**
 * Pull Request 事件接入 DTO
 */
import { IsBoolean, IsEnum, IsHexadecimal, IsInt, IsNotEmpty, IsOptional, IsString, Min } from 'class-validator';
import { MergeMethod, PullReqEventBase } from '../../../types';

export class PullReqEventBaseDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  id?: string; // 事件 ID，缺省时自动生成

  @IsInt()
  @Min(1)
  principal_id!: number;

  @IsInt()
  @Min(1)
  pullreq_id!: number;

  @IsInt()
  @Min(1)
  source_repo_id!: number;

  @IsInt()
  @Min(1)
  target_repo_id!: number;

  @IsInt()
  @Min(1)
  number!: number;
}

export class PullReqCreatedEventDto extends PullReqEventBaseDto {
  @IsString()
  @IsNotEmpty()
  source_branch!: string;

  @IsString()
  @IsNotEmpty()
  target_branch!: string;

  @IsHexadecimal()
  source_sha!: string;
}

export class PullReqReopenedEventDto extends PullReqEventBaseDto {
  @IsHexadecimal()
  source_sha!: string;

  @IsHexadecimal()
  merge_base_sha!: string;
}

export class PullReqBranchUpdatedEventDto extends PullReqEventBaseDto {
  @IsHexadecimal()
  old_sha!: string;

  @IsHexadecimal()
  new_sha!: string;

  @IsBoolean()
  forced!: boolean;
}

export class PullReqClosedEventDto extends PullReqEventBaseDto {
  @IsHexadecimal()
  source_sha!: string;
}

export class PullReqMergedEventDto extends PullReqEventBaseDto {
  @IsEnum(MergeMethod)
  merge_method!: MergeMethod;

  @IsHexadecimal()
  merge_sha!: string;

  @IsHexadecimal()
  target_sha!: string;

  @IsHexadecimal()
  source_sha!: string;
}

/**
 * 转换为事件公共字段
 */
export function toEventBase(dto: PullReqEventBaseDto): PullReqEventBase {
  return {
    principalId: dto.principal_id,
    pullReqId: dto.pullreq_id,
    sourceRepoId: dto.source_repo_id,
    targetRepoId: dto.target_repo_id,
    number: dto.number,
  };
}
