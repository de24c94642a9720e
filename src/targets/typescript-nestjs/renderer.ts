/**
 * NestJS Renderer
 *
 * Emits one feature module per entity under `src/modules/<entity>/`:
 * - TypeORM entity with relation decorators
 * - class-validator DTOs (create, update, response)
 * - repository wrapping the TypeORM repository plus stored-procedure calls
 * - service, controller and module
 * - Jest spec for the service
 */

import type { EntityBlueprint, EntityRef, ScalarField } from '../../generators/blueprint.js'
import { joinLines, quote, TargetRenderer } from '../renderer.js'
import type { ProjectContext, RenderedFile } from '../renderer.js'

const MODULES_DIR = 'src/modules'

function moduleDir(entity: EntityRef): string {
  return `${MODULES_DIR}/${entity.kebabName}`
}

/**
 * Import path from a file in `<module>/<subdir>/` to another module's entity
 */
function entityImport(from: EntityRef, to: EntityRef): string {
  if (from.kebabName === to.kebabName) return `./${to.kebabName}.entity`
  return `../../${to.kebabName}/entities/${to.kebabName}.entity`
}

function baseType(type: string): string {
  return type.replace(/ \| null$/, '')
}

function validatorsFor(field: ScalarField): string[] {
  const decorators: string[] = []
  switch (baseType(field.type)) {
    case 'string':
      decorators.push(field.sourceType === 'UUID' ? 'IsUUID' : field.sourceType === 'BigDecimal' ? 'IsNumberString' : 'IsString')
      break
    case 'number':
      decorators.push(['Integer', 'Long', 'Short'].includes(field.sourceType) ? 'IsInt' : 'IsNumber')
      break
    case 'boolean':
      decorators.push('IsBoolean')
      break
    case 'Date':
      decorators.push('IsDate')
      break
  }
  if (field.length !== undefined && baseType(field.type) === 'string') decorators.push('MaxLength')
  return decorators
}

function decoratorCall(name: string, field: ScalarField): string {
  return name === 'MaxLength' ? `@MaxLength(${field.length})` : `@${name}()`
}

export class NestRenderer extends TargetRenderer {
  shared(project: ProjectContext): RenderedFile[] {
    const base = [
      `import { CreateDateColumn, DeleteDateColumn, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm'`,
      '',
      'export abstract class BaseEntity {',
      '  @PrimaryGeneratedColumn()',
      '  id!: number',
      '',
      `  @CreateDateColumn({ name: 'created_at' })`,
      '  createdAt!: Date',
      '',
      `  @UpdateDateColumn({ name: 'updated_at' })`,
      '  updatedAt!: Date',
      '',
      `  @DeleteDateColumn({ name: 'deleted_at', nullable: true })`,
      '  deletedAt!: Date | null',
      '}',
    ]

    const app: string[] = [
      `import { Module } from '@nestjs/common'`,
      `import { TypeOrmModule } from '@nestjs/typeorm'`,
    ]
    for (const entity of project.entities) {
      app.push(`import { ${entity.entityName}Module } from './modules/${entity.kebabName}/${entity.kebabName}.module'`)
    }
    app.push(
      '',
      '@Module({',
      '  imports: [',
      '    TypeOrmModule.forRoot({',
      `      type: 'postgres',`,
      '      url: process.env.DATABASE_URL,',
      '      autoLoadEntities: true,',
      '    }),',
      ...project.entities.map((entity) => `    ${entity.entityName}Module,`),
      '  ],',
      '})',
      'export class AppModule {}',
    )

    const main = [
      `import { ValidationPipe } from '@nestjs/common'`,
      `import { NestFactory } from '@nestjs/core'`,
      `import { AppModule } from './app.module'`,
      '',
      'async function bootstrap(): Promise<void> {',
      '  const app = await NestFactory.create(AppModule)',
      '  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }))',
      '  await app.listen(process.env.PORT ?? 3000)',
      '}',
      '',
      'void bootstrap()',
    ]

    return [
      { path: 'src/common/entities/base.entity.ts', content: joinLines(base) },
      { path: 'src/app.module.ts', content: joinLines(app) },
      { path: 'src/main.ts', content: joinLines(main) },
    ]
  }

  protected entity(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const typeorm = new Set<string>(['Column', 'Entity'])
    const related = new Map<string, EntityRef>()
    const body: string[] = []

    for (const field of bp.fields) {
      const options = [`name: '${field.columnName}'`]
      if (field.length !== undefined) options.push(`length: ${field.length}`)
      if (field.precision !== undefined) options.push(`precision: ${field.precision}`)
      if (field.scale !== undefined) options.push(`scale: ${field.scale}`)
      if (field.nullable) options.push('nullable: true')
      if (field.unique) options.push('unique: true')
      if (field.columnDefault !== undefined) options.push(`default: () => ${quote(field.columnDefault)}`)
      body.push(`  @Column({ ${options.join(', ')} })`, `  ${field.name}!: ${field.type}`, '')
    }

    for (const reference of bp.references) {
      related.set(reference.target.entityName, reference.target)
      const decorator = reference.kind === 'one-to-one' ? 'OneToOne' : 'ManyToOne'
      typeorm.add(decorator).add('JoinColumn')
      const options: string[] = []
      if (!reference.nullable) options.push('nullable: false')
      if (reference.onDelete) options.push(`onDelete: '${reference.onDelete.replace('_', ' ')}'`)
      const suffix = options.length > 0 ? `, { ${options.join(', ')} }` : ''
      body.push(
        `  @${decorator}(() => ${reference.target.entityName}${suffix})`,
        `  @JoinColumn({ name: '${reference.columnName}', referencedColumnName: '${reference.referencedColumn}' })`,
        `  ${reference.name}!: ${reference.target.entityName}${reference.nullable ? ' | null' : ''}`,
        '',
      )
    }

    for (const collection of bp.collections) {
      related.set(collection.element.entityName, collection.element)
      typeorm.add('OneToMany')
      const item = collection.element.variableName
      body.push(
        `  @OneToMany(() => ${collection.element.entityName}, (${item}) => ${item}.${collection.mappedBy}, { cascade: ['insert', 'update'] })`,
        `  ${collection.name}!: ${collection.type}`,
        '',
      )
    }

    for (const back of bp.backReferences) {
      related.set(back.source.entityName, back.source)
      typeorm.add('OneToOne')
      const item = back.source.variableName
      body.push(
        `  @OneToOne(() => ${back.source.entityName}, (${item}) => ${item}.${back.mappedBy})`,
        `  ${back.name}!: ${back.source.entityName} | null`,
        '',
      )
    }

    for (const join of bp.joins) {
      related.set(join.element.entityName, join.element)
      typeorm.add('ManyToMany').add('JoinTable')
      body.push(
        `  @ManyToMany(() => ${join.element.entityName})`,
        '  @JoinTable({',
        `    name: '${join.joinTable}',`,
        `    joinColumn: { name: '${join.joinColumn}', referencedColumnName: 'id' },`,
        `    inverseJoinColumn: { name: '${join.inverseJoinColumn}', referencedColumnName: 'id' },`,
        '  })',
        `  ${join.name}!: ${join.type}`,
        '',
      )
    }

    const header: string[] = []
    if (bp.indexes.length > 0) typeorm.add('Index')
    header.push(`import { ${[...typeorm].sort().join(', ')} } from 'typeorm'`)
    header.push(`import { BaseEntity } from '../../../common/entities/base.entity'`)
    for (const ref of related.values()) {
      if (ref.entityName === entity.entityName) continue
      header.push(`import { ${ref.entityName} } from '${entityImport(entity, ref)}'`)
    }
    header.push('')

    if (bp.comment) header.push(`/** ${bp.comment} */`)
    if (bp.indexes.length > 0) {
      header.push(`@Entity({ name: '${entity.tableName}'${bp.schemaName ? `, schema: '${bp.schemaName}'` : ''} })`)
      for (const index of bp.indexes) {
        const columns = index.columns.map((column) => `'${column}'`).join(', ')
        header.push(`@Index('${index.name}', [${columns}]${index.unique ? ', { unique: true }' : ''})`)
      }
    } else {
      header.push(`@Entity('${entity.tableName}')`)
    }
    header.push(`export class ${entity.entityName} extends BaseEntity {`)

    if (body.length > 0 && body[body.length - 1] === '') body.pop()
    const lines = [...header, ...body, '}']

    return [{ path: `${moduleDir(entity)}/entities/${entity.kebabName}.entity.ts`, content: joinLines(lines) }]
  }

  protected dto(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const dir = `${moduleDir(entity)}/dto`
    const validators = new Set<string>()
    const body: string[] = []

    for (const field of bp.fields) {
      if (field.nullable) {
        validators.add('IsOptional')
        body.push('  @IsOptional()')
      }
      for (const name of validatorsFor(field)) {
        validators.add(name)
        body.push(`  ${decoratorCall(name, field)}`)
      }
      body.push(`  ${field.name}${field.nullable ? '?' : '!'}: ${field.type}`, '')
    }
    for (const reference of bp.references) {
      if (reference.nullable) {
        validators.add('IsOptional')
        body.push('  @IsOptional()')
      }
      validators.add('IsInt')
      body.push('  @IsInt()', `  ${reference.idName}${reference.nullable ? '?' : '!'}: ${reference.idType}`, '')
    }
    for (const join of bp.joins) {
      validators.add('IsOptional').add('IsInt')
      body.push('  @IsOptional()', '  @IsInt({ each: true })', `  ${join.name}Ids?: number[]`, '')
    }
    if (body.length > 0) body.pop()

    const create: string[] = []
    if (validators.size > 0) create.push(`import { ${[...validators].sort().join(', ')} } from 'class-validator'`, '')
    create.push(`export class Create${entity.entityName}Dto {`, ...body, '}')

    const update = [
      `import { PartialType } from '@nestjs/mapped-types'`,
      `import { Create${entity.entityName}Dto } from './create-${entity.kebabName}.dto'`,
      '',
      `export class Update${entity.entityName}Dto extends PartialType(Create${entity.entityName}Dto) {}`,
    ]

    const response: string[] = [
      `import type { ${entity.entityName} } from '../entities/${entity.kebabName}.entity'`,
      '',
      `export class ${entity.entityName}ResponseDto {`,
      `  id!: ${bp.primaryKeyType}`,
      ...bp.fields.map((field) => `  ${field.name}!: ${field.type}`),
      ...bp.references.map((reference) => `  ${reference.idName}!: ${reference.idType}`),
      '  createdAt!: Date',
      '  updatedAt!: Date',
      '',
      `  static from(${entity.variableName}: ${entity.entityName}): ${entity.entityName}ResponseDto {`,
      `    const dto = new ${entity.entityName}ResponseDto()`,
      `    dto.id = ${entity.variableName}.id`,
      ...bp.fields.map((field) => `    dto.${field.name} = ${entity.variableName}.${field.name}`),
      ...bp.references.map(
        (reference) =>
          `    dto.${reference.idName} = ${entity.variableName}.${reference.name}${reference.nullable ? '?' : ''}.id${reference.nullable ? ' ?? null' : ''}`,
      ),
      `    dto.createdAt = ${entity.variableName}.createdAt`,
      `    dto.updatedAt = ${entity.variableName}.updatedAt`,
      '    return dto',
      '  }',
      '}',
    ]

    return [
      { path: `${dir}/create-${entity.kebabName}.dto.ts`, content: joinLines(create) },
      { path: `${dir}/update-${entity.kebabName}.dto.ts`, content: joinLines(update) },
      { path: `${dir}/${entity.kebabName}-response.dto.ts`, content: joinLines(response) },
    ]
  }

  protected repository(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const name = entity.entityName
    const lines = [
      `import { Injectable } from '@nestjs/common'`,
      `import { InjectRepository } from '@nestjs/typeorm'`,
      `import { DataSource, Repository } from 'typeorm'`,
      `import { ${name} } from '../entities/${entity.kebabName}.entity'`,
      '',
      '@Injectable()',
      `export class ${name}Repository {`,
      '  constructor(',
      `    @InjectRepository(${name}) private readonly repository: Repository<${name}>,`,
      '    private readonly dataSource: DataSource,',
      '  ) {}',
      '',
      `  findAll(skip = 0, take = 20): Promise<${name}[]> {`,
      '    return this.repository.find({ skip, take })',
      '  }',
      '',
      `  findById(id: ${bp.primaryKeyType}): Promise<${name} | null> {`,
      '    return this.repository.findOneBy({ id })',
      '  }',
      '',
      `  create(data: Partial<${name}>): ${name} {`,
      '    return this.repository.create(data)',
      '  }',
      '',
      `  save(${entity.variableName}: ${name}): Promise<${name}> {`,
      `    return this.repository.save(${entity.variableName})`,
      '  }',
      '',
      `  async softDelete(id: ${bp.primaryKeyType}): Promise<void> {`,
      '    await this.repository.softDelete(id)',
      '  }',
    ]

    for (const procedure of bp.procedures) {
      const params = procedure.parameters.map((parameter) => `${parameter.name}: ${parameter.type}`).join(', ')
      const args = procedure.parameters.map((parameter) => parameter.name).join(', ')
      const placeholders = procedure.parameters.map((_, index) => `$${index + 1}`).join(', ')
      const returnType = procedure.returnType ?? 'void'
      lines.push(
        '',
        `  async ${procedure.methodName}(${params}): Promise<${returnType}> {`,
        `    const rows: Array<{ result: ${returnType} }> = await this.dataSource.query(`,
        `      'SELECT ${procedure.name}(${placeholders}) AS result',`,
        `      [${args}],`,
        '    )',
        procedure.returnType ? `    return rows[0]?.result ?? null` : '    void rows',
        '  }',
      )
    }
    lines.push('}')

    return [{ path: `${moduleDir(entity)}/repositories/${entity.kebabName}.repository.ts`, content: joinLines(lines) }]
  }

  protected service(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const name = entity.entityName
    const variable = entity.variableName
    const lines = [
      `import { Injectable, NotFoundException } from '@nestjs/common'`,
      `import type { Create${name}Dto } from '../dto/create-${entity.kebabName}.dto'`,
      `import type { Update${name}Dto } from '../dto/update-${entity.kebabName}.dto'`,
      `import type { ${name} } from '../entities/${entity.kebabName}.entity'`,
      `import { ${name}Repository } from '../repositories/${entity.kebabName}.repository'`,
      '',
      '@Injectable()',
      `export class ${name}Service {`,
      `  constructor(private readonly ${variable}Repository: ${name}Repository) {}`,
      '',
      `  findAll(skip?: number, take?: number): Promise<${name}[]> {`,
      `    return this.${variable}Repository.findAll(skip, take)`,
      '  }',
      '',
      `  async findOne(id: ${bp.primaryKeyType}): Promise<${name}> {`,
      `    const ${variable} = await this.${variable}Repository.findById(id)`,
      `    if (!${variable}) {`,
      `      throw new NotFoundException(\`${name} \${id} not found\`)`,
      '    }',
      `    return ${variable}`,
      '  }',
      '',
      `  create(dto: Create${name}Dto): Promise<${name}> {`,
      `    const ${variable} = this.${variable}Repository.create(this.toEntity(dto))`,
      `    return this.${variable}Repository.save(${variable})`,
      '  }',
      '',
      `  async update(id: ${bp.primaryKeyType}, dto: Update${name}Dto): Promise<${name}> {`,
      `    const ${variable} = await this.findOne(id)`,
      `    Object.assign(${variable}, this.toEntity(dto))`,
      `    return this.${variable}Repository.save(${variable})`,
      '  }',
      '',
      `  async remove(id: ${bp.primaryKeyType}): Promise<void> {`,
      '    await this.findOne(id)',
      `    await this.${variable}Repository.softDelete(id)`,
      '  }',
      '',
      `  private toEntity(dto: Update${name}Dto): Partial<${name}> {`,
      `    const data: Partial<${name}> = {}`,
      ...bp.fields.map((field) => `    if (dto.${field.name} !== undefined) data.${field.name} = dto.${field.name}`),
    ]
    for (const reference of bp.references) {
      lines.push(
        `    if (dto.${reference.idName} !== undefined) {`,
        `      data.${reference.name} = ${reference.nullable ? `dto.${reference.idName} === null ? null : ` : ''}{ id: dto.${reference.idName} } as ${name}['${reference.name}']`,
        '    }',
      )
    }
    lines.push('    return data', '  }', '}')

    return [{ path: `${moduleDir(entity)}/services/${entity.kebabName}.service.ts`, content: joinLines(lines) }]
  }

  protected controller(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const name = entity.entityName
    const route = entity.tableName.replace(/_/g, '-')
    const controller = [
      `import { Body, Controller, Delete, Get, HttpCode, Param, ParseIntPipe, Patch, Post, Query } from '@nestjs/common'`,
      `import { Create${name}Dto } from '../dto/create-${entity.kebabName}.dto'`,
      `import { ${name}ResponseDto } from '../dto/${entity.kebabName}-response.dto'`,
      `import { Update${name}Dto } from '../dto/update-${entity.kebabName}.dto'`,
      `import { ${name}Service } from '../services/${entity.kebabName}.service'`,
      '',
      `@Controller('${route}')`,
      `export class ${name}Controller {`,
      `  constructor(private readonly ${entity.variableName}Service: ${name}Service) {}`,
      '',
      '  @Get()',
      `  async findAll(@Query('skip') skip?: string, @Query('take') take?: string): Promise<${name}ResponseDto[]> {`,
      `    const items = await this.${entity.variableName}Service.findAll(skip ? Number(skip) : undefined, take ? Number(take) : undefined)`,
      `    return items.map((item) => ${name}ResponseDto.from(item))`,
      '  }',
      '',
      `  @Get(':id')`,
      `  async findOne(@Param('id', ParseIntPipe) id: number): Promise<${name}ResponseDto> {`,
      `    return ${name}ResponseDto.from(await this.${entity.variableName}Service.findOne(id))`,
      '  }',
      '',
      '  @Post()',
      `  async create(@Body() dto: Create${name}Dto): Promise<${name}ResponseDto> {`,
      `    return ${name}ResponseDto.from(await this.${entity.variableName}Service.create(dto))`,
      '  }',
      '',
      `  @Patch(':id')`,
      `  async update(@Param('id', ParseIntPipe) id: number, @Body() dto: Update${name}Dto): Promise<${name}ResponseDto> {`,
      `    return ${name}ResponseDto.from(await this.${entity.variableName}Service.update(id, dto))`,
      '  }',
      '',
      `  @Delete(':id')`,
      '  @HttpCode(204)',
      `  remove(@Param('id', ParseIntPipe) id: number): Promise<void> {`,
      `    return this.${entity.variableName}Service.remove(id)`,
      '  }',
      '}',
    ]

    const module = [
      `import { Module } from '@nestjs/common'`,
      `import { TypeOrmModule } from '@nestjs/typeorm'`,
      `import { ${name}Controller } from './controllers/${entity.kebabName}.controller'`,
      `import { ${name} } from './entities/${entity.kebabName}.entity'`,
      `import { ${name}Repository } from './repositories/${entity.kebabName}.repository'`,
      `import { ${name}Service } from './services/${entity.kebabName}.service'`,
      '',
      '@Module({',
      `  imports: [TypeOrmModule.forFeature([${name}])],`,
      `  controllers: [${name}Controller],`,
      `  providers: [${name}Service, ${name}Repository],`,
      `  exports: [${name}Service],`,
      '})',
      `export class ${name}Module {}`,
    ]

    return [
      { path: `${moduleDir(entity)}/controllers/${entity.kebabName}.controller.ts`, content: joinLines(controller) },
      { path: `${moduleDir(entity)}/${entity.kebabName}.module.ts`, content: joinLines(module) },
    ]
  }

  protected test(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const name = entity.entityName
    const lines = [
      `import { NotFoundException } from '@nestjs/common'`,
      `import { Test } from '@nestjs/testing'`,
      `import { ${name}Repository } from '../repositories/${entity.kebabName}.repository'`,
      `import { ${name}Service } from './${entity.kebabName}.service'`,
      '',
      `describe('${name}Service', () => {`,
      `  let service: ${name}Service`,
      '  const repository = {',
      '    findAll: jest.fn(),',
      '    findById: jest.fn(),',
      '    create: jest.fn(),',
      '    save: jest.fn(),',
      '    softDelete: jest.fn(),',
      '  }',
      '',
      '  beforeEach(async () => {',
      '    jest.resetAllMocks()',
      '    const moduleRef = await Test.createTestingModule({',
      `      providers: [${name}Service, { provide: ${name}Repository, useValue: repository }],`,
      '    }).compile()',
      `    service = moduleRef.get(${name}Service)`,
      '  })',
      '',
      `  it('returns the ${entity.variableName} when it exists', async () => {`,
      '    repository.findById.mockResolvedValue({ id: 1 })',
      '    await expect(service.findOne(1)).resolves.toEqual({ id: 1 })',
      '  })',
      '',
      `  it('throws NotFoundException for a missing ${entity.variableName}', async () => {`,
      '    repository.findById.mockResolvedValue(null)',
      '    await expect(service.findOne(42)).rejects.toBeInstanceOf(NotFoundException)',
      '  })',
      '',
      `  it('soft-deletes an existing ${entity.variableName}', async () => {`,
      '    repository.findById.mockResolvedValue({ id: 7 })',
      '    await service.remove(7)',
      '    expect(repository.softDelete).toHaveBeenCalledWith(7)',
      '  })',
      '})',
    ]
    return [{ path: `${moduleDir(entity)}/services/${entity.kebabName}.service.spec.ts`, content: joinLines(lines) }]
  }
}
