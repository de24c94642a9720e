/**
 * FastAPI Renderer
 *
 * SQLAlchemy 2.0 declarative models, Pydantic v2 schemas, a repository and
 * service per entity, one APIRouter per entity and pytest tests.
 */

import type { EntityBlueprint, EntityRef, ScalarField } from '../../generators/blueprint.js'
import { toSnakeCase } from '../../core/naming.js'
import { joinLines, quote, TargetRenderer } from '../renderer.js'
import type { ProjectContext, RenderedFile } from '../renderer.js'

/**
 * Merge `from x import a` lines by module, sorted
 */
export function pythonImports(lines: Iterable<string>): string[] {
  const grouped = new Map<string, Set<string>>()
  const plain = new Set<string>()
  for (const line of lines) {
    const match = /^from (\S+) import (.+)$/.exec(line)
    if (!match) {
      plain.add(line)
      continue
    }
    const names = grouped.get(match[1]) ?? new Set<string>()
    for (const name of match[2].split(',')) names.add(name.trim())
    grouped.set(match[1], names)
  }
  return [
    ...[...plain].sort(),
    ...[...grouped.keys()].sort().map((module) => `from ${module} import ${[...(grouped.get(module) ?? [])].sort().join(', ')}`),
  ]
}

function optional(type: string): string {
  return type.endsWith(' | None') ? type : `${type} | None`
}

function columnArgs(field: ScalarField, fallback: string): string {
  const args = [quote(field.columnName)]
  if (field.type === fallback) args.push('JSON')
  else if (field.length !== undefined && field.sourceType === 'String') args.push(`String(${field.length})`)
  else if (field.precision !== undefined && field.sourceType === 'BigDecimal') {
    args.push(`Numeric(${field.precision}${field.scale !== undefined ? `, ${field.scale}` : ''})`)
  }
  if (field.unique) args.push('unique=True')
  if (field.columnDefault !== undefined) args.push(`server_default=text(${quote(field.columnDefault)})`)
  return args.join(', ')
}

export class FastApiRenderer extends TargetRenderer {
  constructor(private readonly fallbackType: string) {
    super()
  }

  shared(project: ProjectContext): RenderedFile[] {
    const base = [
      'from datetime import datetime',
      '',
      'from sqlalchemy import DateTime, func',
      'from sqlalchemy.orm import DeclarativeBase, Mapped, mapped_column',
      '',
      '',
      'class Base(DeclarativeBase):',
      '    pass',
      '',
      '',
      'class AuditMixin:',
      '    id: Mapped[int] = mapped_column(primary_key=True)',
      '    active: Mapped[bool] = mapped_column(default=True)',
      '    created_at: Mapped[datetime] = mapped_column(DateTime(timezone=True), server_default=func.now())',
      '    updated_at: Mapped[datetime | None] = mapped_column(DateTime(timezone=True), onupdate=func.now())',
      '    deleted_at: Mapped[datetime | None] = mapped_column(DateTime(timezone=True))',
    ]

    const database = [
      'import os',
      'from collections.abc import Iterator',
      '',
      'from sqlalchemy import create_engine',
      'from sqlalchemy.orm import Session, sessionmaker',
      '',
      `engine = create_engine(os.environ.get("DATABASE_URL", "sqlite:///./${project.projectName}.db"))`,
      'SessionLocal = sessionmaker(bind=engine, autoflush=False)',
      '',
      '',
      'def get_db() -> Iterator[Session]:',
      '    db = SessionLocal()',
      '    try:',
      '        yield db',
      '    finally:',
      '        db.close()',
    ]

    const models = [
      ...project.entities.map((entity) => `from app.models.${entity.snakeName} import ${entity.entityName}`),
      '',
      `__all__ = [${project.entities.map((entity) => quote(entity.entityName)).join(', ')}]`,
    ]

    const main = [
      'from fastapi import FastAPI',
      '',
      'import app.models  # noqa: F401',
      ...project.entities.map((entity) => `from app.routers import ${entity.snakeName} as ${entity.snakeName}_router`),
      '',
      `app = FastAPI(title=${quote(project.projectName)})`,
      ...project.entities.map((entity) => `app.include_router(${entity.snakeName}_router.router)`),
    ]

    return [
      { path: 'app/models/base.py', content: joinLines(base) },
      { path: 'app/models/__init__.py', content: joinLines(models) },
      { path: 'app/database.py', content: joinLines(database) },
      { path: 'app/main.py', content: joinLines(main) },
    ]
  }

  protected entity(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const sqlalchemy = new Set<string>()
    const orm = new Set<string>(['Mapped', 'mapped_column'])
    const typing = new Set<string>()
    const body: string[] = []
    const associations: string[] = []
    const related = new Map<string, EntityRef>()

    for (const field of bp.fields) {
      const args = columnArgs(field, this.fallbackType)
      if (args.includes('JSON')) sqlalchemy.add('JSON')
      if (args.includes('String(')) sqlalchemy.add('String')
      if (args.includes('Numeric(')) sqlalchemy.add('Numeric')
      if (field.columnDefault !== undefined) sqlalchemy.add('text')
      body.push(`    ${field.name}: Mapped[${field.type}] = mapped_column(${args})`)
    }

    for (const reference of bp.references) {
      sqlalchemy.add('ForeignKey')
      orm.add('relationship')
      related.set(reference.target.entityName, reference.target)
      const target = `${reference.target.entityName}${reference.nullable ? ' | None' : ''}`
      const fk = [`ForeignKey(${quote(`${reference.target.tableName}.${reference.referencedColumn}`)}${reference.onDelete ? `, ondelete=${quote(reference.onDelete.replace('_', ' '))}` : ''})`]
      if (reference.unique) fk.push('unique=True')
      body.push(
        `    ${reference.idName}: Mapped[${reference.idType}] = mapped_column(${quote(reference.columnName)}, ${fk.join(', ')})`,
        `    ${reference.name}: Mapped[${target}] = relationship(foreign_keys=[${reference.idName}])`,
      )
    }

    for (const collection of bp.collections) {
      orm.add('relationship')
      related.set(collection.element.entityName, collection.element)
      body.push(
        `    ${collection.name}: Mapped[${collection.type}] = relationship(`,
        `        foreign_keys=${quote(`${collection.element.entityName}.${collection.foreignKeyColumn}`)},`,
        `        cascade="save-update, merge",`,
        '    )',
      )
    }

    for (const back of bp.backReferences) {
      orm.add('relationship')
      related.set(back.source.entityName, back.source)
      body.push(
        `    ${back.name}: Mapped[${back.source.entityName} | None] = relationship(`,
        `        foreign_keys=${quote(`${back.source.entityName}.${back.foreignKeyColumn}`)},`,
        '        uselist=False,',
        '        viewonly=True,',
        '    )',
      )
    }

    for (const join of bp.joins) {
      orm.add('relationship')
      sqlalchemy.add('Column').add('ForeignKey').add('Table')
      related.set(join.element.entityName, join.element)
      const variable = `${join.joinTable}_table`
      associations.push(
        '',
        `${variable} = Table(`,
        `    ${quote(join.joinTable)},`,
        '    Base.metadata,',
        `    Column(${quote(join.joinColumn)}, ForeignKey(${quote(`${entity.tableName}.id`)}), primary_key=True),`,
        `    Column(${quote(join.inverseJoinColumn)}, ForeignKey(${quote(`${join.element.tableName}.id`)}), primary_key=True),`,
        '    extend_existing=True,',
        ')',
      )
      body.push(`    ${join.name}: Mapped[${join.type}] = relationship(secondary=${variable})`)
    }

    const tableArgs: string[] = []
    if (bp.indexes.length > 0) {
      sqlalchemy.add('Index')
      tableArgs.push('    __table_args__ = (')
      for (const index of bp.indexes) {
        const columns = index.columns.map((column) => quote(column)).join(', ')
        tableArgs.push(`        Index(${quote(index.name)}, ${columns}${index.unique ? ', unique=True' : ''}),`)
      }
      tableArgs.push('    )')
    }

    const typeCheckingImports = [...related.values()]
      .filter((ref) => ref.entityName !== entity.entityName)
      .map((ref) => `    from app.models.${ref.snakeName} import ${ref.entityName}`)
    if (typeCheckingImports.length > 0) typing.add('TYPE_CHECKING')

    const imports = pythonImports([
      ...bp.imports,
      ...[...sqlalchemy].map((name) => `from sqlalchemy import ${name}`),
      ...[...orm].map((name) => `from sqlalchemy.orm import ${name}`),
      ...[...typing].map((name) => `from typing import ${name}`),
      'from app.models.base import AuditMixin, Base',
    ])

    const lines = [
      'from __future__ import annotations',
      '',
      ...imports,
      ...(typeCheckingImports.length > 0 ? ['', 'if TYPE_CHECKING:', ...typeCheckingImports] : []),
      ...associations,
      '',
      '',
      `class ${entity.entityName}(AuditMixin, Base):`,
      ...(bp.comment ? [`    """${bp.comment}"""`, ''] : []),
      `    __tablename__ = ${quote(entity.tableName)}`,
      ...tableArgs,
      ...(body.length > 0 ? ['', ...body] : []),
    ]
    return [{ path: `app/models/${entity.snakeName}.py`, content: joinLines(lines) }]
  }

  protected dto(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const name = entity.entityName
    const base: string[] = []
    const update: string[] = []
    const pydantic = new Set<string>(['BaseModel', 'ConfigDict'])

    for (const field of bp.fields) {
      let value = field.nullable ? ' = None' : ''
      if (field.length !== undefined && field.sourceType === 'String') {
        pydantic.add('Field')
        value = ` = Field(${field.nullable ? 'default=None, ' : ''}max_length=${field.length})`
      }
      base.push(`    ${field.name}: ${field.type}${value}`)
      update.push(`    ${field.name}: ${optional(field.type)} = None`)
    }
    for (const reference of bp.references) {
      base.push(`    ${reference.idName}: ${reference.idType}${reference.nullable ? ' = None' : ''}`)
      update.push(`    ${reference.idName}: ${optional(reference.idType)} = None`)
    }
    for (const join of bp.joins) {
      base.push(`    ${join.name}_ids: list[int] = []`)
      update.push(`    ${join.name}_ids: list[int] | None = None`)
    }

    const lines = [
      ...pythonImports([...bp.imports, ...[...pydantic].map((entry) => `from pydantic import ${entry}`), 'from datetime import datetime']),
      '',
      '',
      `class ${name}Base(BaseModel):`,
      ...(base.length > 0 ? base : ['    pass']),
      '',
      '',
      `class ${name}Create(${name}Base):`,
      '    pass',
      '',
      '',
      `class ${name}Update(BaseModel):`,
      ...(update.length > 0 ? update : ['    pass']),
      '',
      '',
      `class ${name}Read(${name}Base):`,
      '    model_config = ConfigDict(from_attributes=True)',
      '',
      '    id: int',
      '    created_at: datetime',
      '    updated_at: datetime | None = None',
    ]
    return [{ path: `app/schemas/${entity.snakeName}.py`, content: joinLines(lines) }]
  }

  protected repository(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const name = entity.entityName
    const imports = ['from sqlalchemy import select', 'from sqlalchemy.orm import Session', `from app.models.${entity.snakeName} import ${name}`]
    if (bp.procedures.length > 0) imports.push('from sqlalchemy import text', ...bp.imports)

    const lines = [
      ...pythonImports(imports),
      '',
      '',
      `class ${name}Repository:`,
      '    def __init__(self, db: Session) -> None:',
      '        self.db = db',
      '',
      `    def find_all(self, skip: int = 0, limit: int = 20) -> list[${name}]:`,
      `        stmt = select(${name}).where(${name}.deleted_at.is_(None)).offset(skip).limit(limit)`,
      '        return list(self.db.scalars(stmt))',
      '',
      `    def find_by_id(self, id: int) -> ${name} | None:`,
      `        return self.db.get(${name}, id)`,
      '',
      `    def save(self, ${entity.snakeName}: ${name}) -> ${name}:`,
      `        self.db.add(${entity.snakeName})`,
      '        self.db.commit()',
      `        self.db.refresh(${entity.snakeName})`,
      `        return ${entity.snakeName}`,
    ]

    for (const procedure of bp.procedures) {
      const params = procedure.parameters.map((parameter) => `${parameter.name}: ${parameter.type}`)
      const binds = procedure.parameters.map((parameter) => `:${parameter.name}`).join(', ')
      const values = procedure.parameters.map((parameter) => `${quote(parameter.name)}: ${parameter.name}`).join(', ')
      lines.push(
        '',
        `    def ${procedure.methodName}(${['self', ...params].join(', ')}) -> ${procedure.returnType ?? 'None'}:`,
        `        result = self.db.execute(text(${quote(`SELECT ${procedure.name}(${binds})`)}), {${values}})`,
        procedure.returnType ? '        return result.scalar()' : '        self.db.commit()',
      )
    }
    return [{ path: `app/repositories/${entity.snakeName}_repository.py`, content: joinLines(lines) }]
  }

  protected service(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const name = entity.entityName
    const variable = entity.snakeName
    const lines = [
      'from datetime import datetime, timezone',
      '',
      'from fastapi import HTTPException, status',
      '',
      `from app.models.${variable} import ${name}`,
      `from app.repositories.${variable}_repository import ${name}Repository`,
      `from app.schemas.${variable} import ${name}Create, ${name}Update`,
      '',
      '',
      `class ${name}Service:`,
      `    def __init__(self, repository: ${name}Repository) -> None:`,
      '        self.repository = repository',
      '',
      `    def list(self, skip: int = 0, limit: int = 20) -> list[${name}]:`,
      '        return self.repository.find_all(skip, limit)',
      '',
      `    def get(self, id: int) -> ${name}:`,
      `        ${variable} = self.repository.find_by_id(id)`,
      `        if ${variable} is None or ${variable}.deleted_at is not None:`,
      `            raise HTTPException(status_code=status.HTTP_404_NOT_FOUND, detail=f"${name} {id} not found")`,
      `        return ${variable}`,
      '',
      `    def create(self, data: ${name}Create) -> ${name}:`,
      `        values = data.model_dump(exclude={${bp.joins.map((join) => quote(`${join.name}_ids`)).join(', ')}})`,
      `        return self.repository.save(${name}(**values))`,
      '',
      `    def update(self, id: int, data: ${name}Update) -> ${name}:`,
      `        ${variable} = self.get(id)`,
      `        for key, value in data.model_dump(exclude_unset=True, exclude={${bp.joins.map((join) => quote(`${join.name}_ids`)).join(', ')}}).items():`,
      `            setattr(${variable}, key, value)`,
      `        return self.repository.save(${variable})`,
      '',
      '    def delete(self, id: int) -> None:',
      `        ${variable} = self.get(id)`,
      `        ${variable}.active = False`,
      `        ${variable}.deleted_at = datetime.now(timezone.utc)`,
      `        self.repository.save(${variable})`,
    ]
    return [{ path: `app/services/${variable}_service.py`, content: joinLines(lines) }]
  }

  protected controller(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const name = entity.entityName
    const variable = entity.snakeName
    const lines = [
      'from fastapi import APIRouter, Depends, status',
      'from sqlalchemy.orm import Session',
      '',
      'from app.database import get_db',
      `from app.repositories.${variable}_repository import ${name}Repository`,
      `from app.schemas.${variable} import ${name}Create, ${name}Read, ${name}Update`,
      `from app.services.${variable}_service import ${name}Service`,
      '',
      `router = APIRouter(prefix="/api/${entity.tableName.toLowerCase().replace(/_/g, '-')}", tags=[${quote(entity.tableName)}])`,
      '',
      '',
      `def get_service(db: Session = Depends(get_db)) -> ${name}Service:`,
      `    return ${name}Service(${name}Repository(db))`,
      '',
      '',
      `@router.get("", response_model=list[${name}Read])`,
      `def list_${toSnakeCase(entity.pluralName)}(skip: int = 0, limit: int = 20, service: ${name}Service = Depends(get_service)):`,
      '    return service.list(skip, limit)',
      '',
      '',
      `@router.get("/{id}", response_model=${name}Read)`,
      `def get_${variable}(id: int, service: ${name}Service = Depends(get_service)):`,
      '    return service.get(id)',
      '',
      '',
      `@router.post("", response_model=${name}Read, status_code=status.HTTP_201_CREATED)`,
      `def create_${variable}(data: ${name}Create, service: ${name}Service = Depends(get_service)):`,
      '    return service.create(data)',
      '',
      '',
      `@router.patch("/{id}", response_model=${name}Read)`,
      `def update_${variable}(id: int, data: ${name}Update, service: ${name}Service = Depends(get_service)):`,
      '    return service.update(id, data)',
      '',
      '',
      '@router.delete("/{id}", status_code=status.HTTP_204_NO_CONTENT)',
      `def delete_${variable}(id: int, service: ${name}Service = Depends(get_service)) -> None:`,
      '    service.delete(id)',
    ]
    return [{ path: `app/routers/${variable}.py`, content: joinLines(lines) }]
  }

  protected test(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const name = entity.entityName
    const variable = entity.snakeName
    const lines = [
      'from unittest.mock import MagicMock',
      '',
      'import pytest',
      'from fastapi import HTTPException',
      '',
      `from app.models.${variable} import ${name}`,
      `from app.services.${variable}_service import ${name}Service`,
      '',
      '',
      'def test_get_raises_404_when_missing():',
      '    repository = MagicMock()',
      '    repository.find_by_id.return_value = None',
      `    service = ${name}Service(repository)`,
      '',
      '    with pytest.raises(HTTPException) as error:',
      '        service.get(1)',
      '',
      '    assert error.value.status_code == 404',
      '',
      '',
      'def test_delete_marks_row_inactive():',
      `    ${variable} = ${name}()`,
      `    ${variable}.deleted_at = None`,
      '    repository = MagicMock()',
      `    repository.find_by_id.return_value = ${variable}`,
      `    service = ${name}Service(repository)`,
      '',
      '    service.delete(7)',
      '',
      `    assert ${variable}.active is False`,
      `    repository.save.assert_called_once_with(${variable})`,
    ]
    return [{ path: `tests/test_${variable}_service.py`, content: joinLines(lines) }]
  }
}
