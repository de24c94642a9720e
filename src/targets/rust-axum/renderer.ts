/**
 * Axum Renderer
 *
 * sqlx row structs, serde DTOs, a repository per entity with loaders for each
 * relation, a service and an axum router. Relations are expressed as id
 * columns plus repository loaders; there is no ORM navigation.
 */

import type { EntityBlueprint, EntityRef } from '../../generators/blueprint.js'
import { toSnakeCase } from '../../core/naming.js'
import { joinLines, quote, TargetRenderer } from '../renderer.js'
import type { ProjectContext, RenderedFile } from '../renderer.js'
import { AXUM_FEATURE_MODULES } from './features.js'

function useBlock(imports: Iterable<string>): string[] {
  return [...new Set(imports)].sort().map((entry) => `use ${entry};`)
}

function optional(type: string): string {
  return type.startsWith('Option<') ? type : `Option<${type}>`
}

const MODULE_DIRS = ['models', 'dto', 'repository', 'service', 'handlers'] as const

const BASE_DEPENDENCIES = [
  'anyhow = "1"',
  'axum = "0.7"',
  'chrono = { version = "0.4", features = ["serde"] }',
  'rust_decimal = { version = "1", features = ["serde"] }',
  'serde = { version = "1", features = ["derive"] }',
  'serde_json = "1"',
  'sqlx = { version = "0.8", features = ["runtime-tokio", "postgres", "chrono", "uuid", "rust_decimal"] }',
  'thiserror = "1"',
  'tokio = { version = "1", features = ["full"] }',
  'uuid = { version = "1", features = ["serde", "v4"] }',
  'validator = { version = "0.18", features = ["derive"] }',
]

/**
 * Dependency lines sorted by crate name, first declaration winning
 */
function mergeDependencies(lines: readonly string[]): string[] {
  const byCrate = new Map<string, string>()
  for (const line of lines) {
    const crate = line.slice(0, line.indexOf(' = '))
    if (!byCrate.has(crate)) byCrate.set(crate, line)
  }
  return [...byCrate.entries()].sort(([a], [b]) => (a < b ? -1 : 1)).map(([, line]) => line)
}

export class AxumRenderer extends TargetRenderer {
  shared(project: ProjectContext): RenderedFile[] {
    const crate = toSnakeCase(project.projectName)
    const files: RenderedFile[] = []
    const modules = project.features.map((id) => AXUM_FEATURE_MODULES[id])
    const dependencies = mergeDependencies([...BASE_DEPENDENCIES, ...modules.flatMap((feature) => feature.dependencies)])

    files.push({
      path: 'Cargo.toml',
      content: joinLines([
        '[package]',
        `name = ${quote(crate)}`,
        'version = "0.1.0"',
        'edition = "2021"',
        '',
        '[lib]',
        'name = "app"',
        '',
        '[dependencies]',
        ...dependencies,
      ]),
    })

    files.push({
      path: 'src/lib.rs',
      content: joinLines([...MODULE_DIRS.map((dir) => `pub mod ${dir};`), 'pub mod error;', ...modules.map((feature) => `pub mod ${feature.module};`)]),
    })

    for (const dir of MODULE_DIRS) {
      const suffix = dir === 'repository' ? '_repository' : dir === 'service' ? '_service' : dir === 'handlers' ? '_handler' : ''
      const lines = project.entities.map((entity) => `pub mod ${entity.snakeName}${suffix};`)
      if (dir === 'models') {
        lines.push(
          '',
          '#[derive(Debug, Clone, Copy)]',
          'pub struct IndexSpec {',
          "    pub name: &'static str,",
          "    pub columns: &'static [&'static str],",
          '    pub unique: bool,',
          '}',
        )
      }
      files.push({ path: `src/${dir}/mod.rs`, content: joinLines(lines) })
    }

    files.push({
      path: 'src/error.rs',
      content: joinLines([
        'use axum::http::StatusCode;',
        'use axum::response::{IntoResponse, Response};',
        'use axum::Json;',
        'use serde_json::json;',
        '',
        '#[derive(Debug, thiserror::Error)]',
        'pub enum AppError {',
        '    #[error("{0} not found")]',
        '    NotFound(String),',
        '    #[error(transparent)]',
        '    Database(#[from] sqlx::Error),',
        '}',
        '',
        'impl IntoResponse for AppError {',
        '    fn into_response(self) -> Response {',
        '        let status = match self {',
        '            AppError::NotFound(_) => StatusCode::NOT_FOUND,',
        '            AppError::Database(_) => StatusCode::INTERNAL_SERVER_ERROR,',
        '        };',
        '        (status, Json(json!({ "error": self.to_string() }))).into_response()',
        '    }',
        '}',
      ]),
    })

    const routes = [
      ...project.entities.map((entity) => `        .merge(app::handlers::${entity.snakeName}_handler::router(pool.clone()))`),
      ...modules.flatMap((feature) => (feature.router ? [`        .merge(${feature.router})`] : [])),
    ]
    files.push({
      path: 'src/main.rs',
      content: joinLines([
        'use axum::Router;',
        'use sqlx::postgres::PgPoolOptions;',
        '',
        '#[tokio::main]',
        'async fn main() -> anyhow::Result<()> {',
        '    let url = std::env::var("DATABASE_URL")?;',
        '    let pool = PgPoolOptions::new().max_connections(5).connect(&url).await?;',
        '',
        `    let app = Router::new()${routes.length === 0 ? ';' : ''}`,
        ...routes.map((route, index) => (index === routes.length - 1 ? `${route};` : route)),
        '',
        '    let listener = tokio::net::TcpListener::bind("0.0.0.0:3000").await?;',
        '    axum::serve(listener, app).await?;',
        '    Ok(())',
        '}',
      ]),
    })

    return files
  }

  protected entity(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const imports = new Set<string>(['serde::{Deserialize, Serialize}', 'sqlx::FromRow', 'chrono::{DateTime, Utc}', ...bp.imports])
    const body = [`    pub id: ${bp.primaryKeyType},`]

    for (const field of bp.fields) {
      if (field.columnDefault !== undefined) body.push(`    /// Database default: \`${field.columnDefault}\``)
      if (field.name !== field.columnName) body.push(`    #[sqlx(rename = ${quote(field.columnName)})]`)
      body.push(`    pub ${field.name}: ${field.type},`)
    }
    for (const reference of bp.references) {
      body.push(`    pub ${reference.idName}: ${reference.idType},`)
    }
    body.push('    pub active: bool,', '    pub created_at: DateTime<Utc>,', '    pub updated_at: Option<DateTime<Utc>>,', '    pub deleted_at: Option<DateTime<Utc>>,')

    const impl = [`impl ${entity.entityName} {`, `    pub const TABLE: &'static str = ${quote(entity.tableName)};`]
    if (bp.indexes.length > 0) {
      imports.add('super::IndexSpec')
      impl.push('', "    pub const INDEXES: &'static [IndexSpec] = &[")
      for (const index of bp.indexes) {
        const columns = index.columns.map((column) => quote(column)).join(', ')
        impl.push(`        IndexSpec { name: ${quote(index.name)}, columns: &[${columns}], unique: ${index.unique} },`)
      }
      impl.push('    ];')
    }
    impl.push('}')

    const lines = [
      ...useBlock(imports),
      '',
      ...(bp.comment ? [`/// ${bp.comment}`] : []),
      '#[derive(Debug, Clone, Serialize, Deserialize, FromRow)]',
      `pub struct ${entity.entityName} {`,
      ...body,
      '}',
      '',
      ...impl,
    ]
    return [{ path: `src/models/${entity.snakeName}.rs`, content: joinLines(lines) }]
  }

  protected dto(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const name = entity.entityName
    const create: string[] = []
    const update: string[] = []

    for (const field of bp.fields) {
      if (field.length !== undefined && field.sourceType === 'String') create.push(`    #[validate(length(max = ${field.length}))]`)
      create.push(`    pub ${field.name}: ${field.type},`)
      update.push(`    pub ${field.name}: ${optional(field.type)},`)
    }
    for (const reference of bp.references) {
      create.push(`    pub ${reference.idName}: ${reference.idType},`)
      update.push(`    pub ${reference.idName}: ${optional(reference.idType)},`)
    }
    for (const join of bp.joins) {
      create.push('    #[serde(default)]', `    pub ${join.name}_ids: Vec<i64>,`)
      update.push(`    pub ${join.name}_ids: Option<Vec<i64>>,`)
    }

    const lines = [
      ...useBlock(['serde::Deserialize', 'validator::Validate', ...bp.imports]),
      '',
      '#[derive(Debug, Deserialize, Validate)]',
      `pub struct Create${name}Request {`,
      ...create,
      '}',
      '',
      '#[derive(Debug, Default, Deserialize, Validate)]',
      `pub struct Update${name}Request {`,
      ...update,
      '}',
    ]
    return [{ path: `src/dto/${entity.snakeName}.rs`, content: joinLines(lines) }]
  }

  protected repository(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const name = entity.entityName
    const table = entity.tableName
    const columns = [...bp.fields.map((field) => field.columnName), ...bp.references.map((reference) => reference.columnName)]
    const binds = columns.map((_, index) => `$${index + 1}`).join(', ')
    const values = [...bp.fields.map((field) => field.name), ...bp.references.map((reference) => reference.idName)]
    const related = new Map<string, EntityRef>()

    const lines: string[] = [
      'use sqlx::PgPool;',
      '',
      `use crate::dto::${entity.snakeName}::Create${name}Request;`,
      `use crate::models::${entity.snakeName}::${name};`,
    ]
    const loaders: string[] = []

    for (const collection of bp.collections) {
      related.set(collection.element.entityName, collection.element)
      loaders.push(
        '',
        `    pub async fn ${collection.name}(&self, id: i64) -> sqlx::Result<Vec<${collection.element.entityName}>> {`,
        `        sqlx::query_as::<_, ${collection.element.entityName}>(${quote(`SELECT * FROM ${collection.element.tableName} WHERE ${collection.foreignKeyColumn} = $1 AND deleted_at IS NULL`)})`,
        '            .bind(id)',
        '            .fetch_all(&self.pool)',
        '            .await',
        '    }',
      )
    }
    for (const back of bp.backReferences) {
      related.set(back.source.entityName, back.source)
      loaders.push(
        '',
        `    pub async fn ${back.name}(&self, id: i64) -> sqlx::Result<Option<${back.source.entityName}>> {`,
        `        sqlx::query_as::<_, ${back.source.entityName}>(${quote(`SELECT * FROM ${back.source.tableName} WHERE ${back.foreignKeyColumn} = $1 AND deleted_at IS NULL`)})`,
        '            .bind(id)',
        '            .fetch_optional(&self.pool)',
        '            .await',
        '    }',
      )
    }
    for (const join of bp.joins) {
      related.set(join.element.entityName, join.element)
      const sql = `SELECT t.* FROM ${join.element.tableName} t JOIN ${join.joinTable} j ON j.${join.inverseJoinColumn} = t.id WHERE j.${join.joinColumn} = $1`
      loaders.push(
        '',
        `    pub async fn ${join.name}(&self, id: i64) -> sqlx::Result<Vec<${join.element.entityName}>> {`,
        `        sqlx::query_as::<_, ${join.element.entityName}>(${quote(sql)})`,
        '            .bind(id)',
        '            .fetch_all(&self.pool)',
        '            .await',
        '    }',
        '',
        `    pub async fn set_${join.name}(&self, id: i64, ids: &[i64]) -> sqlx::Result<()> {`,
        '        let mut tx = self.pool.begin().await?;',
        `        sqlx::query(${quote(`DELETE FROM ${join.joinTable} WHERE ${join.joinColumn} = $1`)}).bind(id).execute(&mut *tx).await?;`,
        '        for other in ids {',
        `            sqlx::query(${quote(`INSERT INTO ${join.joinTable} (${join.joinColumn}, ${join.inverseJoinColumn}) VALUES ($1, $2)`)})`,
        '                .bind(id)',
        '                .bind(other)',
        '                .execute(&mut *tx)',
        '                .await?;',
        '        }',
        '        tx.commit().await',
        '    }',
      )
    }
    for (const procedure of bp.procedures) {
      const params = procedure.parameters.map((parameter) => `${parameter.name}: ${parameter.type}`)
      const placeholders = procedure.parameters.map((_, index) => `$${index + 1}`).join(', ')
      const bindings = procedure.parameters.map((parameter) => `            .bind(${parameter.name})`)
      const sql = quote(`SELECT ${procedure.name}(${placeholders})`)
      if (procedure.returnType) {
        loaders.push(
          '',
          `    pub async fn ${procedure.methodName}(${['&self', ...params].join(', ')}) -> sqlx::Result<${procedure.returnType}> {`,
          `        sqlx::query_scalar(${sql})`,
          ...bindings,
          '            .fetch_one(&self.pool)',
          '            .await',
          '    }',
        )
      } else {
        loaders.push(
          '',
          `    pub async fn ${procedure.methodName}(${['&self', ...params].join(', ')}) -> sqlx::Result<()> {`,
          `        sqlx::query(${sql})`,
          ...bindings,
          '            .execute(&self.pool)',
          '            .await?;',
          '        Ok(())',
          '    }',
        )
      }
    }

    for (const ref of related.values()) {
      if (ref.entityName !== name) lines.push(`use crate::models::${ref.snakeName}::${ref.entityName};`)
    }
    for (const entry of bp.procedures.length > 0 ? bp.imports : []) lines.push(`use ${entry};`)

    const insert =
      columns.length > 0
        ? `INSERT INTO ${table} (${columns.join(', ')}) VALUES (${binds}) RETURNING *`
        : `INSERT INTO ${table} DEFAULT VALUES RETURNING *`

    lines.push(
      '',
      '#[derive(Clone)]',
      `pub struct ${name}Repository {`,
      '    pool: PgPool,',
      '}',
      '',
      `impl ${name}Repository {`,
      '    pub fn new(pool: PgPool) -> Self {',
      '        Self { pool }',
      '    }',
      '',
      `    pub async fn find_all(&self, offset: i64, limit: i64) -> sqlx::Result<Vec<${name}>> {`,
      `        sqlx::query_as::<_, ${name}>(${quote(`SELECT * FROM ${table} WHERE deleted_at IS NULL ORDER BY id OFFSET $1 LIMIT $2`)})`,
      '            .bind(offset)',
      '            .bind(limit)',
      '            .fetch_all(&self.pool)',
      '            .await',
      '    }',
      '',
      `    pub async fn find_by_id(&self, id: i64) -> sqlx::Result<Option<${name}>> {`,
      `        sqlx::query_as::<_, ${name}>(${quote(`SELECT * FROM ${table} WHERE id = $1 AND deleted_at IS NULL`)})`,
      '            .bind(id)',
      '            .fetch_optional(&self.pool)',
      '            .await',
      '    }',
      '',
      `    pub async fn insert(&self, req: Create${name}Request) -> sqlx::Result<${name}> {`,
      `        sqlx::query_as::<_, ${name}>(${quote(insert)})`,
      ...values.map((value) => `            .bind(req.${value})`),
      '            .fetch_one(&self.pool)',
      '            .await',
      '    }',
      '',
      '    pub async fn soft_delete(&self, id: i64) -> sqlx::Result<u64> {',
      `        let result = sqlx::query(${quote(`UPDATE ${table} SET active = false, deleted_at = now() WHERE id = $1 AND deleted_at IS NULL`)})`,
      '            .bind(id)',
      '            .execute(&self.pool)',
      '            .await?;',
      '        Ok(result.rows_affected())',
      '    }',
      ...loaders,
      '}',
    )
    return [{ path: `src/repository/${entity.snakeName}_repository.rs`, content: joinLines(lines) }]
  }

  protected service(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const name = entity.entityName
    const lines = [
      `use crate::dto::${entity.snakeName}::Create${name}Request;`,
      'use crate::error::AppError;',
      `use crate::models::${entity.snakeName}::${name};`,
      `use crate::repository::${entity.snakeName}_repository::${name}Repository;`,
      '',
      '#[derive(Clone)]',
      `pub struct ${name}Service {`,
      `    repository: ${name}Repository,`,
      '}',
      '',
      `impl ${name}Service {`,
      `    pub fn new(repository: ${name}Repository) -> Self {`,
      '        Self { repository }',
      '    }',
      '',
      `    pub async fn list(&self, offset: i64, limit: i64) -> Result<Vec<${name}>, AppError> {`,
      '        Ok(self.repository.find_all(offset, limit).await?)',
      '    }',
      '',
      `    pub async fn get(&self, id: i64) -> Result<${name}, AppError> {`,
      '        self.repository',
      '            .find_by_id(id)',
      '            .await?',
      `            .ok_or_else(|| AppError::NotFound(format!("${name} {id}")))`,
      '    }',
      '',
      `    pub async fn create(&self, req: Create${name}Request) -> Result<${name}, AppError> {`,
      '        Ok(self.repository.insert(req).await?)',
      '    }',
      '',
      '    pub async fn delete(&self, id: i64) -> Result<(), AppError> {',
      '        match self.repository.soft_delete(id).await? {',
      `            0 => Err(AppError::NotFound(format!("${name} {id}"))),`,
      '            _ => Ok(()),',
      '        }',
      '    }',
      '}',
    ]
    return [{ path: `src/service/${entity.snakeName}_service.rs`, content: joinLines(lines) }]
  }

  protected controller(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const name = entity.entityName
    const route = `/api/${entity.tableName.toLowerCase().replace(/_/g, '-')}`
    const lines = [
      'use axum::extract::{Path, Query, State};',
      'use axum::http::StatusCode;',
      'use axum::routing::get;',
      'use axum::{Json, Router};',
      'use serde::Deserialize;',
      'use sqlx::PgPool;',
      '',
      `use crate::dto::${entity.snakeName}::Create${name}Request;`,
      'use crate::error::AppError;',
      `use crate::models::${entity.snakeName}::${name};`,
      `use crate::repository::${entity.snakeName}_repository::${name}Repository;`,
      `use crate::service::${entity.snakeName}_service::${name}Service;`,
      '',
      '#[derive(Debug, Deserialize)]',
      'pub struct Page {',
      '    #[serde(default)]',
      '    pub offset: i64,',
      '    #[serde(default = "default_limit")]',
      '    pub limit: i64,',
      '}',
      '',
      'fn default_limit() -> i64 {',
      '    20',
      '}',
      '',
      `pub fn router(pool: PgPool) -> Router {`,
      `    let service = ${name}Service::new(${name}Repository::new(pool));`,
      '    Router::new()',
      `        .route(${quote(route)}, get(list).post(create))`,
      `        .route(${quote(`${route}/:id`)}, get(find).delete(remove))`,
      '        .with_state(service)',
      '}',
      '',
      `async fn list(State(service): State<${name}Service>, Query(page): Query<Page>) -> Result<Json<Vec<${name}>>, AppError> {`,
      '    Ok(Json(service.list(page.offset, page.limit).await?))',
      '}',
      '',
      `async fn find(State(service): State<${name}Service>, Path(id): Path<i64>) -> Result<Json<${name}>, AppError> {`,
      '    Ok(Json(service.get(id).await?))',
      '}',
      '',
      'async fn create(',
      `    State(service): State<${name}Service>,`,
      `    Json(req): Json<Create${name}Request>,`,
      `) -> Result<(StatusCode, Json<${name}>), AppError> {`,
      '    Ok((StatusCode::CREATED, Json(service.create(req).await?)))',
      '}',
      '',
      `async fn remove(State(service): State<${name}Service>, Path(id): Path<i64>) -> Result<StatusCode, AppError> {`,
      '    service.delete(id).await?;',
      '    Ok(StatusCode::NO_CONTENT)',
      '}',
    ]
    return [{ path: `src/handlers/${entity.snakeName}_handler.rs`, content: joinLines(lines) }]
  }

  protected test(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const name = entity.entityName
    const lengthChecked = bp.fields.find((field) => field.length !== undefined && field.sourceType === 'String')
    const lines = [
      `//! Request validation for ${entity.tableName}`,
      '',
      'use validator::Validate;',
      '',
      '#[test]',
      `fn update_${entity.snakeName}_request_defaults_to_no_changes() {`,
      `    let req = app::dto::${entity.snakeName}::Update${name}Request::default();`,
      '    assert!(req.validate().is_ok());',
      '}',
    ]
    if (lengthChecked) {
      lines.push(
        '',
        '#[test]',
        `fn update_${entity.snakeName}_request_accepts_${lengthChecked.name}_within_limit() {`,
        `    let req = app::dto::${entity.snakeName}::Update${name}Request {`,
        `        ${lengthChecked.name}: Some("x".repeat(${lengthChecked.length ?? 0})),`,
        '        ..Default::default()',
        '    };',
        '    assert!(req.validate().is_ok());',
        '}',
      )
    }
    return [{ path: `tests/${entity.snakeName}_dto_test.rs`, content: joinLines(lines) }]
  }
}
