/**
 * Axum feature packs
 *
 * Each pack is one crate module. The renderer declares the module in
 * `lib.rs`, adds its Cargo dependencies and merges its router.
 */

import { definePack } from '../../features/feature-pack.js'
import type { FeatureId, FeatureOptions, FeaturePackSet, StorageBackend } from '../../features/feature-pack.js'
import { joinLines, quote } from '../renderer.js'

export interface AxumFeatureModule {
  module: string
  /** Cargo.toml `[dependencies]` lines */
  dependencies: readonly string[]
  /** Router expression merged into the app in `main.rs` */
  router?: string
}

export const AXUM_FEATURE_MODULES: Record<FeatureId, AxumFeatureModule> = {
  'social-login': {
    module: 'social',
    dependencies: ['oauth2 = { version = "4", features = ["reqwest"] }', 'reqwest = { version = "0.11", features = ["json"] }'],
    router: 'app::social::router(pool.clone())',
  },
  mail: {
    module: 'mail',
    dependencies: ['lettre = { version = "0.11", default-features = false, features = ["builder", "smtp-transport", "tokio1-rustls-tls"] }', 'tera = "1"', 'tracing = "0.1"'],
  },
  'file-storage': {
    module: 'storage',
    dependencies: ['object_store = { version = "0.11", features = ["aws", "azure"] }'],
    router: 'app::storage::router()?',
  },
  'password-reset': {
    module: 'password_reset',
    dependencies: ['hex = "0.4"', 'rand = "0.8"'],
    router: 'app::password_reset::router(pool.clone())',
  },
}

const MAIL_TEMPLATES: Record<string, string[]> = {
  welcome: ['<h1>Welcome, {{ name }}</h1>', '<p>Your {{ app_name }} account is ready.</p>'],
  password_reset: ['<h1>Reset your password</h1>', '<p>Follow <a href="{{ reset_url }}">this link</a> within {{ minutes }} minutes.</p>'],
  notification: ['<h1>{{ title }}</h1>', '<p>{{ message }}</p>'],
}

function socialLogin(options: FeatureOptions): Map<string, string> {
  const files = new Map<string, string>()

  const providers = options.socialProviders.map((provider) => `        ${quote(provider)} => Some(${quote(provider.toUpperCase())}),`)

  files.set(
    'src/social.rs',
    joinLines([
      'use axum::extract::{Path, Query, State};',
      'use axum::http::StatusCode;',
      'use axum::response::{IntoResponse, Redirect, Response};',
      'use axum::routing::get;',
      'use axum::{Json, Router};',
      'use oauth2::basic::BasicClient;',
      'use oauth2::reqwest::async_http_client;',
      'use oauth2::{AuthUrl, AuthorizationCode, ClientId, ClientSecret, CsrfToken, RedirectUrl, Scope, TokenResponse, TokenUrl};',
      'use serde::Deserialize;',
      'use serde_json::{json, Value};',
      'use sqlx::PgPool;',
      '',
      '/// Environment prefix of a configured provider',
      "fn env_prefix(provider: &str) -> Option<&'static str> {",
      '    match provider {',
      ...providers,
      '        _ => None,',
      '    }',
      '}',
      '',
      'fn setting(prefix: &str, key: &str) -> Option<String> {',
      '    std::env::var(format!("{prefix}_{key}")).ok()',
      '}',
      '',
      'fn client(prefix: &str) -> Option<BasicClient> {',
      '    Some(',
      '        BasicClient::new(',
      '            ClientId::new(setting(prefix, "CLIENT_ID")?),',
      '            Some(ClientSecret::new(setting(prefix, "CLIENT_SECRET")?)),',
      '            AuthUrl::new(setting(prefix, "AUTH_URL")?).ok()?,',
      '            Some(TokenUrl::new(setting(prefix, "TOKEN_URL")?).ok()?),',
      '        )',
      '        .set_redirect_uri(RedirectUrl::new(setting(prefix, "REDIRECT_URL")?).ok()?),',
      '    )',
      '}',
      '',
      'fn failure(status: StatusCode, err: impl ToString) -> Response {',
      '    (status, Json(json!({ "error": err.to_string() }))).into_response()',
      '}',
      '',
      '#[derive(Deserialize)]',
      'struct Callback {',
      '    code: String,',
      '}',
      '',
      'async fn login(Path(provider): Path<String>) -> Response {',
      '    match env_prefix(&provider).and_then(client) {',
      '        Some(client) => {',
      '            let (url, _state) = client',
      '                .authorize_url(CsrfToken::new_random)',
      '                .add_scope(Scope::new("openid".into()))',
      '                .add_scope(Scope::new("email".into()))',
      '                .url();',
      '            Redirect::to(url.as_str()).into_response()',
      '        }',
      '        None => failure(StatusCode::NOT_FOUND, "unknown provider"),',
      '    }',
      '}',
      '',
      'async fn callback(State(pool): State<PgPool>, Path(provider): Path<String>, Query(query): Query<Callback>) -> Response {',
      '    let Some(prefix) = env_prefix(&provider) else {',
      '        return failure(StatusCode::NOT_FOUND, "unknown provider");',
      '    };',
      '    let (Some(client), Some(userinfo_url)) = (client(prefix), setting(prefix, "USERINFO_URL")) else {',
      '        return failure(StatusCode::NOT_FOUND, "provider is not configured");',
      '    };',
      '    let token = match client.exchange_code(AuthorizationCode::new(query.code)).request_async(async_http_client).await {',
      '        Ok(token) => token,',
      '        Err(err) => return failure(StatusCode::UNAUTHORIZED, err),',
      '    };',
      '    let info: Value = match reqwest::Client::new().get(userinfo_url).bearer_auth(token.access_token().secret()).send().await {',
      '        Ok(response) => match response.json().await {',
      '            Ok(info) => info,',
      '            Err(err) => return failure(StatusCode::BAD_GATEWAY, err),',
      '        },',
      '        Err(err) => return failure(StatusCode::BAD_GATEWAY, err),',
      '    };',
      '    let subject = info.get("sub").or_else(|| info.get("id")).map(|id| id.to_string().trim_matches(\'"\').to_string()).unwrap_or_default();',
      '    let email = info.get("email").and_then(Value::as_str);',
      '    let linked = sqlx::query("INSERT INTO social_accounts (provider, provider_id, email) VALUES ($1, $2, $3) ON CONFLICT DO NOTHING")',
      '        .bind(&provider)',
      '        .bind(&subject)',
      '        .bind(email)',
      '        .execute(&pool)',
      '        .await;',
      '    match linked {',
      '        Ok(_) => Json(json!({ "provider": provider, "providerId": subject })).into_response(),',
      '        Err(err) => failure(StatusCode::INTERNAL_SERVER_ERROR, err),',
      '    }',
      '}',
      '',
      'pub fn router(pool: PgPool) -> Router {',
      '    Router::new()',
      '        .route("/api/auth/:provider", get(login))',
      '        .route("/api/auth/:provider/callback", get(callback))',
      '        .with_state(pool)',
      '}',
    ]),
  )
  return files
}

function mail(options: FeatureOptions): Map<string, string> {
  const files = new Map<string, string>()

  files.set(
    'src/mail.rs',
    joinLines([
      'use lettre::message::header::ContentType;',
      'use lettre::transport::smtp::authentication::Credentials;',
      'use lettre::{AsyncSmtpTransport, AsyncTransport, Message, Tokio1Executor};',
      'use tera::{Context, Tera};',
      '',
      `const APP_NAME: &str = ${quote(options.projectName)};`,
      '',
      '#[derive(Debug, thiserror::Error)]',
      'pub enum MailError {',
      '    #[error(transparent)]',
      '    Template(#[from] tera::Error),',
      '    #[error(transparent)]',
      '    Message(#[from] lettre::error::Error),',
      '    #[error(transparent)]',
      '    Address(#[from] lettre::address::AddressError),',
      '    #[error(transparent)]',
      '    Transport(#[from] lettre::transport::smtp::Error),',
      '}',
      '',
      'pub struct Mailer {',
      '    transport: AsyncSmtpTransport<Tokio1Executor>,',
      '    templates: Tera,',
      '    from: String,',
      '}',
      '',
      'impl Mailer {',
      '    /// Reads SMTP_HOST, SMTP_USERNAME, SMTP_PASSWORD and MAIL_FROM.',
      '    pub fn from_env() -> anyhow::Result<Self> {',
      '        let credentials = Credentials::new(std::env::var("SMTP_USERNAME")?, std::env::var("SMTP_PASSWORD")?);',
      '        let transport = AsyncSmtpTransport::<Tokio1Executor>::relay(&std::env::var("SMTP_HOST")?)?',
      '            .credentials(credentials)',
      '            .build();',
      '        Ok(Self { transport, templates: Tera::new("templates/email/*.html")?, from: std::env::var("MAIL_FROM")? })',
      '    }',
      '',
      '    pub async fn send(&self, to: &str, subject: &str, template: &str, context: &Context) -> Result<(), MailError> {',
      '        let html = self.templates.render(&format!("{template}.html"), context)?;',
      '        let message = Message::builder()',
      '            .from(self.from.parse()?)',
      '            .to(to.parse()?)',
      '            .subject(subject)',
      '            .header(ContentType::TEXT_HTML)',
      '            .body(html)?;',
      '        if let Err(err) = self.transport.send(message).await {',
      '            tracing::error!("failed to send {template} to {to}: {err}");',
      '            return Err(err.into());',
      '        }',
      '        Ok(())',
      '    }',
      '',
      '    pub async fn send_welcome(&self, to: &str, name: &str) -> Result<(), MailError> {',
      '        let mut context = Context::new();',
      '        context.insert("name", name);',
      '        context.insert("app_name", APP_NAME);',
      '        self.send(to, &format!("Welcome to {APP_NAME}"), "welcome", &context).await',
      '    }',
      '',
      '    pub async fn send_password_reset(&self, to: &str, reset_url: &str, minutes: i64) -> Result<(), MailError> {',
      '        let mut context = Context::new();',
      '        context.insert("reset_url", reset_url);',
      '        context.insert("minutes", &minutes);',
      '        self.send(to, "Password reset", "password_reset", &context).await',
      '    }',
      '',
      '    pub async fn send_notification(&self, to: &str, title: &str, message: &str) -> Result<(), MailError> {',
      '        let mut context = Context::new();',
      '        context.insert("title", title);',
      '        context.insert("message", message);',
      '        self.send(to, title, "notification", &context).await',
      '    }',
      '}',
    ]),
  )

  for (const [name, body] of Object.entries(MAIL_TEMPLATES)) {
    files.set(`templates/email/${name}.html`, joinLines(['<!DOCTYPE html>', '<html>', '<body>', ...body, '</body>', '</html>']))
  }
  return files
}

const STORE_BUILDERS: Record<StorageBackend, string[]> = {
  local: [
    '    let root = std::env::var("STORAGE_ROOT").unwrap_or_else(|_| "uploads".into());',
    '    std::fs::create_dir_all(&root)?;',
    '    Ok(Arc::new(object_store::local::LocalFileSystem::new_with_prefix(root)?))',
  ],
  s3: ['    Ok(Arc::new(object_store::aws::AmazonS3Builder::from_env().with_bucket_name(std::env::var("STORAGE_BUCKET")?).build()?))'],
  azure: ['    Ok(Arc::new(object_store::azure::MicrosoftAzureBuilder::from_env().with_container_name(std::env::var("STORAGE_CONTAINER")?).build()?))'],
}

function fileStorage(options: FeatureOptions): Map<string, string> {
  const files = new Map<string, string>()

  files.set(
    'src/storage.rs',
    joinLines([
      'use std::sync::Arc;',
      '',
      'use axum::body::Bytes;',
      'use axum::extract::{Path, State};',
      'use axum::http::StatusCode;',
      'use axum::response::{IntoResponse, Response};',
      'use axum::routing::{delete, get, post};',
      'use axum::{Json, Router};',
      'use object_store::path::Path as StorePath;',
      'use object_store::ObjectStore;',
      'use serde_json::json;',
      '',
      `/// Store for the \`${options.storageBackend}\` backend`,
      'pub fn store() -> anyhow::Result<Arc<dyn ObjectStore>> {',
      ...STORE_BUILDERS[options.storageBackend],
      '}',
      '',
      'fn failure(status: StatusCode, err: impl ToString) -> Response {',
      '    (status, Json(json!({ "error": err.to_string() }))).into_response()',
      '}',
      '',
      'async fn upload(State(store): State<Arc<dyn ObjectStore>>, body: Bytes) -> Response {',
      '    let key = uuid::Uuid::new_v4().to_string();',
      '    match store.put(&StorePath::from(key.as_str()), body.into()).await {',
      '        Ok(_) => (StatusCode::CREATED, Json(json!({ "key": key }))).into_response(),',
      '        Err(err) => failure(StatusCode::INTERNAL_SERVER_ERROR, err),',
      '    }',
      '}',
      '',
      'async fn download(State(store): State<Arc<dyn ObjectStore>>, Path(key): Path<String>) -> Response {',
      '    match store.get(&StorePath::from(key.as_str())).await {',
      '        Ok(result) => match result.bytes().await {',
      '            Ok(bytes) => bytes.into_response(),',
      '            Err(err) => failure(StatusCode::INTERNAL_SERVER_ERROR, err),',
      '        },',
      '        Err(err) => failure(StatusCode::NOT_FOUND, err),',
      '    }',
      '}',
      '',
      'async fn remove(State(store): State<Arc<dyn ObjectStore>>, Path(key): Path<String>) -> Response {',
      '    match store.delete(&StorePath::from(key.as_str())).await {',
      '        Ok(()) => StatusCode::NO_CONTENT.into_response(),',
      '        Err(err) => failure(StatusCode::INTERNAL_SERVER_ERROR, err),',
      '    }',
      '}',
      '',
      'pub fn router() -> anyhow::Result<Router> {',
      '    Ok(Router::new()',
      '        .route("/api/files", post(upload))',
      '        .route("/api/files/:key", get(download))',
      '        .route("/api/files/:key", delete(remove))',
      '        .with_state(store()?))',
      '}',
    ]),
  )
  return files
}

function passwordReset(options: FeatureOptions): Map<string, string> {
  const files = new Map<string, string>()

  files.set(
    'src/password_reset.rs',
    joinLines([
      'use axum::extract::State;',
      'use axum::http::StatusCode;',
      'use axum::routing::post;',
      'use axum::{Json, Router};',
      'use chrono::{Duration, Utc};',
      'use rand::RngCore;',
      'use serde::Deserialize;',
      'use sqlx::PgPool;',
      '',
      `pub const TOKEN_LIFETIME_MINUTES: i64 = ${options.resetTokenMinutes};`,
      '',
      '#[derive(Deserialize)]',
      'pub struct ForgotPassword {',
      '    pub email: String,',
      '}',
      '',
      '#[derive(Deserialize)]',
      'pub struct ResetPassword {',
      '    pub token: String,',
      '    pub password: String,',
      '}',
      '',
      'pub async fn request_token(pool: &PgPool, email: &str) -> Result<String, sqlx::Error> {',
      '    let mut raw = [0u8; 32];',
      '    rand::thread_rng().fill_bytes(&mut raw);',
      '    let token = hex::encode(raw);',
      '    sqlx::query("INSERT INTO password_reset_tokens (token, email, expires_at) VALUES ($1, $2, $3)")',
      '        .bind(&token)',
      '        .bind(email)',
      '        .bind(Utc::now() + Duration::minutes(TOKEN_LIFETIME_MINUTES))',
      '        .execute(pool)',
      '        .await?;',
      '    Ok(token)',
      '}',
      '',
      '/// Marks the token used and returns its email, or `None` when it is unknown, used or expired.',
      'pub async fn consume_token(pool: &PgPool, token: &str) -> Result<Option<String>, sqlx::Error> {',
      '    sqlx::query_scalar(',
      '        "UPDATE password_reset_tokens SET used = TRUE WHERE token = $1 AND NOT used AND expires_at > NOW() RETURNING email",',
      '    )',
      '    .bind(token)',
      '    .fetch_optional(pool)',
      '    .await',
      '}',
      '',
      'async fn forgot(State(pool): State<PgPool>, Json(body): Json<ForgotPassword>) -> StatusCode {',
      '    match request_token(&pool, &body.email).await {',
      '        Ok(_) => StatusCode::ACCEPTED,',
      '        Err(_) => StatusCode::INTERNAL_SERVER_ERROR,',
      '    }',
      '}',
      '',
      'async fn reset(State(pool): State<PgPool>, Json(body): Json<ResetPassword>) -> StatusCode {',
      '    match consume_token(&pool, &body.token).await {',
      '        Ok(Some(_)) => StatusCode::NO_CONTENT,',
      '        Ok(None) => StatusCode::BAD_REQUEST,',
      '        Err(_) => StatusCode::INTERNAL_SERVER_ERROR,',
      '    }',
      '}',
      '',
      'pub fn router(pool: PgPool) -> Router {',
      '    Router::new()',
      '        .route("/api/auth/password/forgot", post(forgot))',
      '        .route("/api/auth/password/reset", post(reset))',
      '        .with_state(pool)',
      '}',
    ]),
  )

  files.set(
    'migrations/password_reset_tokens.sql',
    joinLines([
      'CREATE TABLE IF NOT EXISTS password_reset_tokens (',
      '    id BIGSERIAL PRIMARY KEY,',
      '    token VARCHAR(64) NOT NULL UNIQUE,',
      '    email VARCHAR(255) NOT NULL,',
      '    expires_at TIMESTAMPTZ NOT NULL,',
      '    used BOOLEAN NOT NULL DEFAULT FALSE',
      ');',
    ]),
  )
  return files
}

export const axumFeatures: FeaturePackSet = {
  'social-login': definePack('social-login', socialLogin),
  mail: definePack('mail', mail),
  'file-storage': definePack('file-storage', fileStorage),
  'password-reset': definePack('password-reset', passwordReset),
}
