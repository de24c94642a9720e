/**
 * Gin Renderer
 *
 * GORM models under internal/models, request/response structs under
 * internal/dto, a repository interface with its GORM implementation, a
 * service and a Gin handler per entity.
 */

import type { EntityBlueprint } from '../../generators/blueprint.js'
import { toCamelCase, toPascalCase, toSnakeCase } from '../../core/naming.js'
import { joinLines, quote, TargetRenderer } from '../renderer.js'
import type { ProjectContext, RenderedFile } from '../renderer.js'

export function goImports(imports: Iterable<string>): string[] {
  const sorted = [...new Set(imports)].sort()
  if (sorted.length === 0) return []
  const std = sorted.filter((entry) => !entry.includes('.'))
  const external = sorted.filter((entry) => entry.includes('.'))
  const block = [...std.map((entry) => `\t${quote(entry)}`), ...(std.length > 0 && external.length > 0 ? [''] : []), ...external.map((entry) => `\t${quote(entry)}`)]
  return ['import (', ...block, ')', '']
}

/**
 * Align struct fields the way gofmt does
 */
function structBody(rows: ReadonlyArray<[string, string, string]>): string[] {
  const nameWidth = Math.max(0, ...rows.map(([name]) => name.length))
  const typeWidth = Math.max(0, ...rows.map(([, type]) => type.length))
  return rows.map(([name, type, tag]) =>
    tag ? `\t${name.padEnd(nameWidth)} ${type.padEnd(typeWidth)} ${tag}` : `\t${name.padEnd(nameWidth)} ${type}`.trimEnd(),
  )
}

function jsonTag(name: string, omitEmpty = false): string {
  return `json:"${toCamelCase(name)}${omitEmpty ? ',omitempty' : ''}"`
}

// Unquoted literal for the GORM tag
function gormDefault(value: string): string {
  const trimmed = value.trim()
  if (trimmed.length > 1 && trimmed.startsWith("'") && trimmed.endsWith("'")) return trimmed.slice(1, -1)
  if (/^(true|false)$/i.test(trimmed)) return trimmed.toLowerCase()
  return trimmed
}

function deref(type: string): string {
  return type.startsWith('*') ? type.slice(1) : type
}

export class GinRenderer extends TargetRenderer {
  shared(project: ProjectContext): RenderedFile[] {
    const base = [
      'package models',
      '',
      ...goImports(['time', 'gorm.io/gorm']),
      '// BaseModel carries the audit columns every table shares.',
      'type BaseModel struct {',
      ...structBody([
        ['ID', 'int64', '`gorm:"primaryKey" json:"id"`'],
        ['Active', 'bool', '`gorm:"not null;default:true" json:"active"`'],
        ['CreatedAt', 'time.Time', '`json:"createdAt"`'],
        ['UpdatedAt', 'time.Time', '`json:"updatedAt"`'],
        ['DeletedAt', 'gorm.DeletedAt', '`gorm:"index" json:"-"`'],
      ]),
      '}',
      '',
      '// IndexSpec describes a table index for migrations.',
      'type IndexSpec struct {',
      ...structBody([
        ['Name', 'string', ''],
        ['Columns', '[]string', ''],
        ['Unique', 'bool', ''],
      ]),
      '}',
    ]

    const main = [
      'package main',
      '',
      ...goImports([
        'log',
        'os',
        'github.com/gin-gonic/gin',
        'gorm.io/driver/postgres',
        'gorm.io/gorm',
        `${project.namespace}/internal/handler`,
        `${project.namespace}/internal/models`,
        `${project.namespace}/internal/repository`,
        `${project.namespace}/internal/service`,
      ]),
      'func main() {',
      '\tdb, err := gorm.Open(postgres.Open(os.Getenv("DATABASE_URL")), &gorm.Config{})',
      '\tif err != nil {',
      '\t\tlog.Fatalf("connect database: %v", err)',
      '\t}',
      ...(project.entities.length > 0
        ? [`\tif err := db.AutoMigrate(${project.entities.map((entity) => `&models.${entity.entityName}{}`).join(', ')}); err != nil {`, '\t\tlog.Fatalf("migrate: %v", err)', '\t}']
        : []),
      '',
      '\trouter := gin.Default()',
      '\tapi := router.Group("/api")',
      ...project.entities.map(
        (entity) =>
          `\thandler.New${entity.entityName}Handler(service.New${entity.entityName}Service(repository.New${entity.entityName}Repository(db))).Register(api)`,
      ),
      '',
      '\tif err := router.Run(); err != nil {',
      '\t\tlog.Fatal(err)',
      '\t}',
      '}',
    ]

    const common = [
      'package handler',
      '',
      ...goImports(['errors', 'net/http', 'strconv', 'github.com/gin-gonic/gin', `${project.namespace}/internal/service`]),
      'func parseID(c *gin.Context) (int64, bool) {',
      '\tid, err := strconv.ParseInt(c.Param("id"), 10, 64)',
      '\tif err != nil {',
      '\t\tc.JSON(http.StatusBadRequest, gin.H{"error": "invalid id"})',
      '\t\treturn 0, false',
      '\t}',
      '\treturn id, true',
      '}',
      '',
      'func writeError(c *gin.Context, err error) {',
      '\tif errors.Is(err, service.ErrNotFound) {',
      '\t\tc.JSON(http.StatusNotFound, gin.H{"error": err.Error()})',
      '\t\treturn',
      '\t}',
      '\tc.JSON(http.StatusInternalServerError, gin.H{"error": err.Error()})',
      '}',
    ]

    const errors = [
      'package service',
      '',
      ...goImports(['errors']),
      '// ErrNotFound is wrapped by every service lookup that finds no row.',
      'var ErrNotFound = errors.New("not found")',
    ]

    return [
      { path: 'internal/models/base.go', content: joinLines(base) },
      { path: 'internal/handler/common.go', content: joinLines(common) },
      { path: 'internal/service/errors.go', content: joinLines(errors) },
      { path: `cmd/${toSnakeCase(project.projectName)}/main.go`, content: joinLines(main) },
    ]
  }

  protected entity(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const rows: Array<[string, string, string]> = []

    for (const field of bp.fields) {
      const gorm = [`column:${field.columnName}`]
      if (field.length !== undefined) gorm.push(`size:${field.length}`)
      if (field.precision !== undefined) gorm.push(`precision:${field.precision}`)
      if (field.scale !== undefined) gorm.push(`scale:${field.scale}`)
      if (!field.nullable) gorm.push('not null')
      if (field.unique) gorm.push('unique')
      if (field.columnDefault !== undefined) gorm.push(`default:${gormDefault(field.columnDefault)}`)
      rows.push([field.name, field.type, `\`gorm:"${gorm.join(';')}" ${jsonTag(field.name)}\``])
    }

    for (const reference of bp.references) {
      const gorm = [`column:${reference.columnName}`]
      if (!reference.nullable) gorm.push('not null')
      if (reference.unique) gorm.push('uniqueIndex')
      rows.push([reference.idName, reference.idType, `\`gorm:"${gorm.join(';')}" ${jsonTag(reference.idName)}\``])
      const constraint = reference.onDelete ? `;constraint:OnDelete:${reference.onDelete.replace('_', ' ')}` : ''
      rows.push([reference.name, `*${reference.target.entityName}`, `\`gorm:"foreignKey:${reference.idName}${constraint}" ${jsonTag(reference.name, true)}\``])
    }

    for (const collection of bp.collections) {
      rows.push([collection.name, collection.type, `\`gorm:"foreignKey:${toPascalCase(collection.foreignKeyColumn)}" ${jsonTag(collection.name, true)}\``])
    }

    for (const back of bp.backReferences) {
      rows.push([back.name, `*${back.source.entityName}`, `\`gorm:"foreignKey:${toPascalCase(back.foreignKeyColumn)}" ${jsonTag(back.name, true)}\``])
    }

    for (const join of bp.joins) {
      const gorm = `many2many:${join.joinTable};joinForeignKey:${join.joinColumn};joinReferences:${join.inverseJoinColumn}`
      rows.push([join.name, join.type, `\`gorm:"${gorm}" ${jsonTag(join.name, true)}\``])
    }

    const lines = [
      'package models',
      '',
      ...goImports(bp.imports),
      ...(bp.comment ? [`// ${entity.entityName} ${bp.comment}`] : []),
      `type ${entity.entityName} struct {`,
      '\tBaseModel',
      ...structBody(rows),
      '}',
      '',
      `func (${entity.entityName}) TableName() string { return ${quote(entity.tableName)} }`,
    ]

    if (bp.indexes.length > 0) {
      lines.push(
        '',
        `func (${entity.entityName}) Indexes() []IndexSpec {`,
        '\treturn []IndexSpec{',
        ...bp.indexes.map(
          (index) =>
            `\t\t{Name: ${quote(index.name)}, Columns: []string{${index.columns.map((column) => quote(column)).join(', ')}}, Unique: ${index.unique}},`,
        ),
        '\t}',
        '}',
      )
    }

    return [{ path: `internal/models/${entity.snakeName}.go`, content: joinLines(lines) }]
  }

  protected dto(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const name = entity.entityName
    const create: Array<[string, string, string]> = []
    const update: Array<[string, string, string]> = []
    const response: Array<[string, string, string]> = [['ID', 'int64', '`json:"id"`']]
    const assign: string[] = []
    const patch: string[] = []
    const respond: string[] = ['\t\tID: m.ID,']

    for (const field of bp.fields) {
      const binding = field.nullable ? '' : ' binding:"required"'
      create.push([field.name, field.type, `\`${jsonTag(field.name)}${binding}\``])
      const pointer = field.type.startsWith('*') ? field.type : `*${field.type}`
      update.push([field.name, pointer, `\`${jsonTag(field.name, true)}\``])
      response.push([field.name, field.type, `\`${jsonTag(field.name)}\``])
      assign.push(`\t\t${field.name}: r.${field.name},`)
      patch.push(`\tif r.${field.name} != nil {`, `\t\tm.${field.name} = ${field.type.startsWith('*') ? `r.${field.name}` : `*r.${field.name}`}`, '\t}')
      respond.push(`\t\t${field.name}: m.${field.name},`)
    }
    for (const reference of bp.references) {
      const binding = reference.nullable ? '' : ' binding:"required"'
      create.push([reference.idName, reference.idType, `\`${jsonTag(reference.idName)}${binding}\``])
      update.push([reference.idName, `*${deref(reference.idType)}`, `\`${jsonTag(reference.idName, true)}\``])
      response.push([reference.idName, reference.idType, `\`${jsonTag(reference.idName)}\``])
      assign.push(`\t\t${reference.idName}: r.${reference.idName},`)
      patch.push(`\tif r.${reference.idName} != nil {`, `\t\tm.${reference.idName} = ${reference.idType.startsWith('*') ? `r.${reference.idName}` : `*r.${reference.idName}`}`, '\t}')
      respond.push(`\t\t${reference.idName}: m.${reference.idName},`)
    }

    const lines = [
      'package dto',
      '',
      ...goImports([...bp.imports, `${bp.namespace}/internal/models`]),
      `type Create${name}Request struct {`,
      ...structBody(create),
      '}',
      '',
      `type Update${name}Request struct {`,
      ...structBody(update),
      '}',
      '',
      `type ${name}Response struct {`,
      ...structBody(response),
      '}',
      '',
      `func (r Create${name}Request) ToModel() *models.${name} {`,
      `\treturn &models.${name}{`,
      ...assign,
      '\t}',
      '}',
      '',
      `func (r Update${name}Request) Apply(m *models.${name}) {`,
      ...patch,
      '}',
      '',
      `func ${name}ResponseFrom(m *models.${name}) ${name}Response {`,
      `\treturn ${name}Response{`,
      ...respond,
      '\t}',
      '}',
    ]
    return [{ path: `internal/dto/${entity.snakeName}_dto.go`, content: joinLines(lines) }]
  }

  protected repository(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const name = entity.entityName
    const impl = `${entity.variableName}Repository`
    const signatures = [
      `\tFindAll(offset, limit int) ([]models.${name}, error)`,
      `\tFindByID(id int64) (*models.${name}, error)`,
      `\tSave(m *models.${name}) error`,
      '\tDelete(id int64) error',
    ]
    const methods: string[] = []
    for (const procedure of bp.procedures) {
      const params = procedure.parameters.map((parameter) => `${toCamelCase(parameter.name)} ${parameter.type}`).join(', ')
      const args = procedure.parameters.map((parameter) => toCamelCase(parameter.name))
      const placeholders = procedure.parameters.map(() => '?').join(', ')
      const sql = quote(`SELECT ${procedure.name}(${placeholders})`)
      if (procedure.returnType) {
        signatures.push(`\t${procedure.methodName}(${params}) (${procedure.returnType}, error)`)
        methods.push(
          '',
          `func (r *${impl}) ${procedure.methodName}(${params}) (${procedure.returnType}, error) {`,
          `\tvar result ${procedure.returnType}`,
          `\terr := r.db.Raw(${[sql, ...args].join(', ')}).Scan(&result).Error`,
          '\treturn result, err',
          '}',
        )
      } else {
        signatures.push(`\t${procedure.methodName}(${params}) error`)
        methods.push(
          '',
          `func (r *${impl}) ${procedure.methodName}(${params}) error {`,
          `\treturn r.db.Exec(${[sql, ...args].join(', ')}).Error`,
          '}',
        )
      }
    }

    const lines = [
      'package repository',
      '',
      ...goImports([...(bp.procedures.length > 0 ? bp.imports : []), 'gorm.io/gorm', `${bp.namespace}/internal/models`]),
      `type ${name}Repository interface {`,
      ...signatures,
      '}',
      '',
      `type ${impl} struct {`,
      '\tdb *gorm.DB',
      '}',
      '',
      `func New${name}Repository(db *gorm.DB) ${name}Repository {`,
      `\treturn &${impl}{db: db}`,
      '}',
      '',
      `func (r *${impl}) FindAll(offset, limit int) ([]models.${name}, error) {`,
      `\tvar items []models.${name}`,
      '\terr := r.db.Offset(offset).Limit(limit).Find(&items).Error',
      '\treturn items, err',
      '}',
      '',
      `func (r *${impl}) FindByID(id int64) (*models.${name}, error) {`,
      `\tvar item models.${name}`,
      '\tif err := r.db.First(&item, id).Error; err != nil {',
      '\t\treturn nil, err',
      '\t}',
      '\treturn &item, nil',
      '}',
      '',
      `func (r *${impl}) Save(m *models.${name}) error {`,
      '\treturn r.db.Save(m).Error',
      '}',
      '',
      `func (r *${impl}) Delete(id int64) error {`,
      `\treturn r.db.Delete(&models.${name}{}, id).Error`,
      '}',
      ...methods,
    ]
    return [{ path: `internal/repository/${entity.snakeName}_repository.go`, content: joinLines(lines) }]
  }

  protected service(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const name = entity.entityName
    const lines = [
      'package service',
      '',
      ...goImports([
        'errors',
        'fmt',
        'gorm.io/gorm',
        `${bp.namespace}/internal/dto`,
        `${bp.namespace}/internal/models`,
        `${bp.namespace}/internal/repository`,
      ]),
      `type ${name}Service struct {`,
      `\trepo repository.${name}Repository`,
      '}',
      '',
      `func New${name}Service(repo repository.${name}Repository) *${name}Service {`,
      `\treturn &${name}Service{repo: repo}`,
      '}',
      '',
      `func (s *${name}Service) List(offset, limit int) ([]models.${name}, error) {`,
      '\treturn s.repo.FindAll(offset, limit)',
      '}',
      '',
      `func (s *${name}Service) Get(id int64) (*models.${name}, error) {`,
      '\tm, err := s.repo.FindByID(id)',
      '\tif errors.Is(err, gorm.ErrRecordNotFound) {',
      `\t\treturn nil, fmt.Errorf("${name} %d: %w", id, ErrNotFound)`,
      '\t}',
      '\treturn m, err',
      '}',
      '',
      `func (s *${name}Service) Create(req dto.Create${name}Request) (*models.${name}, error) {`,
      '\tm := req.ToModel()',
      '\tif err := s.repo.Save(m); err != nil {',
      '\t\treturn nil, err',
      '\t}',
      '\treturn m, nil',
      '}',
      '',
      `func (s *${name}Service) Update(id int64, req dto.Update${name}Request) (*models.${name}, error) {`,
      '\tm, err := s.Get(id)',
      '\tif err != nil {',
      '\t\treturn nil, err',
      '\t}',
      '\treq.Apply(m)',
      '\tif err := s.repo.Save(m); err != nil {',
      '\t\treturn nil, err',
      '\t}',
      '\treturn m, nil',
      '}',
      '',
      `func (s *${name}Service) Delete(id int64) error {`,
      '\tif _, err := s.Get(id); err != nil {',
      '\t\treturn err',
      '\t}',
      '\treturn s.repo.Delete(id)',
      '}',
    ]
    return [{ path: `internal/service/${entity.snakeName}_service.go`, content: joinLines(lines) }]
  }

  protected controller(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const name = entity.entityName
    const route = entity.tableName.toLowerCase().replace(/_/g, '-')
    const lines = [
      'package handler',
      '',
      ...goImports([
        'net/http',
        'strconv',
        'github.com/gin-gonic/gin',
        `${bp.namespace}/internal/dto`,
        `${bp.namespace}/internal/service`,
      ]),
      `type ${name}Handler struct {`,
      `\tservice *service.${name}Service`,
      '}',
      '',
      `func New${name}Handler(s *service.${name}Service) *${name}Handler {`,
      `\treturn &${name}Handler{service: s}`,
      '}',
      '',
      `func (h *${name}Handler) Register(r *gin.RouterGroup) {`,
      `\tg := r.Group(${quote(`/${route}`)})`,
      '\tg.GET("", h.List)',
      '\tg.GET("/:id", h.Get)',
      '\tg.POST("", h.Create)',
      '\tg.PATCH("/:id", h.Update)',
      '\tg.DELETE("/:id", h.Delete)',
      '}',
      '',
      `func (h *${name}Handler) List(c *gin.Context) {`,
      '\toffset, _ := strconv.Atoi(c.DefaultQuery("offset", "0"))',
      '\tlimit, _ := strconv.Atoi(c.DefaultQuery("limit", "20"))',
      '\titems, err := h.service.List(offset, limit)',
      '\tif err != nil {',
      '\t\tc.JSON(http.StatusInternalServerError, gin.H{"error": err.Error()})',
      '\t\treturn',
      '\t}',
      `\tresponse := make([]dto.${name}Response, 0, len(items))`,
      '\tfor i := range items {',
      `\t\tresponse = append(response, dto.${name}ResponseFrom(&items[i]))`,
      '\t}',
      '\tc.JSON(http.StatusOK, response)',
      '}',
      '',
      `func (h *${name}Handler) Get(c *gin.Context) {`,
      '\tid, ok := parseID(c)',
      '\tif !ok {',
      '\t\treturn',
      '\t}',
      '\tm, err := h.service.Get(id)',
      '\tif err != nil {',
      '\t\twriteError(c, err)',
      '\t\treturn',
      '\t}',
      `\tc.JSON(http.StatusOK, dto.${name}ResponseFrom(m))`,
      '}',
      '',
      `func (h *${name}Handler) Create(c *gin.Context) {`,
      `\tvar req dto.Create${name}Request`,
      '\tif err := c.ShouldBindJSON(&req); err != nil {',
      '\t\tc.JSON(http.StatusBadRequest, gin.H{"error": err.Error()})',
      '\t\treturn',
      '\t}',
      '\tm, err := h.service.Create(req)',
      '\tif err != nil {',
      '\t\twriteError(c, err)',
      '\t\treturn',
      '\t}',
      `\tc.JSON(http.StatusCreated, dto.${name}ResponseFrom(m))`,
      '}',
      '',
      `func (h *${name}Handler) Update(c *gin.Context) {`,
      '\tid, ok := parseID(c)',
      '\tif !ok {',
      '\t\treturn',
      '\t}',
      `\tvar req dto.Update${name}Request`,
      '\tif err := c.ShouldBindJSON(&req); err != nil {',
      '\t\tc.JSON(http.StatusBadRequest, gin.H{"error": err.Error()})',
      '\t\treturn',
      '\t}',
      '\tm, err := h.service.Update(id, req)',
      '\tif err != nil {',
      '\t\twriteError(c, err)',
      '\t\treturn',
      '\t}',
      `\tc.JSON(http.StatusOK, dto.${name}ResponseFrom(m))`,
      '}',
      '',
      `func (h *${name}Handler) Delete(c *gin.Context) {`,
      '\tid, ok := parseID(c)',
      '\tif !ok {',
      '\t\treturn',
      '\t}',
      '\tif err := h.service.Delete(id); err != nil {',
      '\t\twriteError(c, err)',
      '\t\treturn',
      '\t}',
      '\tc.Status(http.StatusNoContent)',
      '}',
    ]

    return [{ path: `internal/handler/${entity.snakeName}_handler.go`, content: joinLines(lines) }]
  }

  protected test(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const name = entity.entityName
    const lines = [
      'package service',
      '',
      ...goImports(['errors', 'testing', 'gorm.io/gorm', `${bp.namespace}/internal/models`]),
      `type fake${name}Repository struct {`,
      `\titems   map[int64]*models.${name}`,
      '\tdeleted []int64',
      '}',
      '',
      `func (f *fake${name}Repository) FindAll(offset, limit int) ([]models.${name}, error) {`,
      `\treturn nil, nil`,
      '}',
      '',
      `func (f *fake${name}Repository) FindByID(id int64) (*models.${name}, error) {`,
      '\tif m, ok := f.items[id]; ok {',
      '\t\treturn m, nil',
      '\t}',
      '\treturn nil, gorm.ErrRecordNotFound',
      '}',
      '',
      `func (f *fake${name}Repository) Save(m *models.${name}) error { return nil }`,
      '',
      `func (f *fake${name}Repository) Delete(id int64) error {`,
      '\tf.deleted = append(f.deleted, id)',
      '\treturn nil',
      '}',
      ...bp.procedures.flatMap((procedure) => {
        const params = procedure.parameters.map((parameter) => `${toCamelCase(parameter.name)} ${parameter.type}`).join(', ')
        return procedure.returnType
          ? ['', `func (f *fake${name}Repository) ${procedure.methodName}(${params}) (${procedure.returnType}, error) {`, `\tvar zero ${procedure.returnType}`, '\treturn zero, nil', '}']
          : ['', `func (f *fake${name}Repository) ${procedure.methodName}(${params}) error { return nil }`]
      }),
      '',
      `func Test${name}ServiceGetMissing(t *testing.T) {`,
      `\ts := New${name}Service(&fake${name}Repository{items: map[int64]*models.${name}{}})`,
      '\t_, err := s.Get(1)',
      '\tif !errors.Is(err, ErrNotFound) {',
      '\t\tt.Fatalf("expected ErrNotFound, got %v", err)',
      '\t}',
      '}',
      '',
      `func Test${name}ServiceDelete(t *testing.T) {`,
      `\trepo := &fake${name}Repository{items: map[int64]*models.${name}{7: {}}}`,
      `\ts := New${name}Service(repo)`,
      '\tif err := s.Delete(7); err != nil {',
      '\t\tt.Fatal(err)',
      '\t}',
      '\tif len(repo.deleted) != 1 || repo.deleted[0] != 7 {',
      '\t\tt.Fatalf("expected id 7 deleted, got %v", repo.deleted)',
      '\t}',
      '}',
    ]
    return [{ path: `internal/service/${entity.snakeName}_service_test.go`, content: joinLines(lines) }]
  }
}
