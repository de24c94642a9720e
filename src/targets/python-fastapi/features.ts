/**
 * FastAPI feature packs
 */

import { definePack } from '../../features/feature-pack.js'
import type { FeatureOptions, FeaturePackSet, StorageBackend } from '../../features/feature-pack.js'
import { joinLines, quote } from '../renderer.js'

function socialLogin(options: FeatureOptions): Map<string, string> {
  const files = new Map<string, string>()

  files.set(
    'app/auth/social/models.py',
    joinLines([
      'from sqlalchemy import String, UniqueConstraint',
      'from sqlalchemy.orm import Mapped, mapped_column',
      '',
      'from app.models.base import AuditMixin, Base',
      '',
      '',
      'class SocialAccount(AuditMixin, Base):',
      '    __tablename__ = "social_accounts"',
      '    __table_args__ = (UniqueConstraint("provider", "provider_id"),)',
      '',
      '    provider: Mapped[str] = mapped_column(String(32))',
      '    provider_id: Mapped[str] = mapped_column(String(255))',
      '    email: Mapped[str | None] = mapped_column(String(255))',
    ]),
  )

  const registrations = options.socialProviders.flatMap((provider) => {
    const env = provider.toUpperCase()
    return [
      'oauth.register(',
      `    name=${quote(provider)},`,
      `    client_id=os.environ.get("${env}_CLIENT_ID"),`,
      `    client_secret=os.environ.get("${env}_CLIENT_SECRET"),`,
      `    server_metadata_url=os.environ.get("${env}_METADATA_URL"),`,
      '    client_kwargs={"scope": "openid email profile"},',
      ')',
    ]
  })

  files.set(
    'app/auth/social/router.py',
    joinLines([
      'import os',
      '',
      'from authlib.integrations.starlette_client import OAuth',
      'from fastapi import APIRouter, Depends, HTTPException, Request',
      'from sqlalchemy import select',
      'from sqlalchemy.orm import Session',
      '',
      'from app.auth.social.models import SocialAccount',
      'from app.database import get_db',
      '',
      `PROVIDERS = (${options.socialProviders.map((provider) => quote(provider)).join(', ')}${options.socialProviders.length === 1 ? ',' : ''})`,
      '',
      'oauth = OAuth()',
      ...registrations,
      '',
      'router = APIRouter(prefix="/auth", tags=["auth"])',
      '',
      '',
      '@router.get("/{provider}")',
      'async def login(provider: str, request: Request):',
      '    if provider not in PROVIDERS:',
      '        raise HTTPException(status_code=404, detail="Unknown provider")',
      '    client = oauth.create_client(provider)',
      '    return await client.authorize_redirect(request, request.url_for("callback", provider=provider))',
      '',
      '',
      '@router.get("/{provider}/callback")',
      'async def callback(provider: str, request: Request, db: Session = Depends(get_db)):',
      '    client = oauth.create_client(provider)',
      '    token = await client.authorize_access_token(request)',
      '    info = token.get("userinfo") or {}',
      '    account = db.scalar(',
      '        select(SocialAccount).where(SocialAccount.provider == provider, SocialAccount.provider_id == str(info.get("sub")))',
      '    )',
      '    if account is None:',
      '        account = SocialAccount(provider=provider, provider_id=str(info.get("sub")), email=info.get("email"))',
      '        db.add(account)',
      '        db.commit()',
      '    return {"provider": provider, "email": account.email}',
    ]),
  )
  return files
}

const MAIL_TEMPLATES: Record<string, string[]> = {
  welcome: ['<h1>Welcome, {{ name }}</h1>', '<p>Your {{ app_name }} account is ready.</p>'],
  password_reset: [
    '<h1>Reset your password</h1>',
    '<p>Follow <a href="{{ reset_url }}">this link</a> within {{ minutes }} minutes.</p>',
  ],
  notification: ['<h1>{{ title }}</h1>', '<p>{{ message }}</p>'],
}

function mail(options: FeatureOptions): Map<string, string> {
  const files = new Map<string, string>()
  files.set(
    'app/mail/service.py',
    joinLines([
      'import logging',
      'import os',
      'from email.message import EmailMessage',
      'from pathlib import Path',
      '',
      'import aiosmtplib',
      'from jinja2 import Environment, FileSystemLoader, select_autoescape',
      '',
      'logger = logging.getLogger(__name__)',
      '',
      'templates = Environment(',
      '    loader=FileSystemLoader(Path(__file__).parent / "templates"),',
      '    autoescape=select_autoescape(),',
      ')',
      '',
      '',
      'async def send(to: str, subject: str, template: str, **context: object) -> None:',
      '    message = EmailMessage()',
      '    message["From"] = os.environ.get("MAIL_FROM", "no-reply@example.com")',
      '    message["To"] = to',
      '    message["Subject"] = subject',
      '    message.set_content(templates.get_template(f"{template}.html").render(**context), subtype="html")',
      '    await aiosmtplib.send(message, hostname=os.environ.get("SMTP_HOST", "localhost"))',
      '    logger.info("sent %s to %s", template, to)',
      '',
      '',
      'async def send_welcome(to: str, name: str) -> None:',
      `    await send(to, "Welcome to ${options.projectName}", "welcome", name=name, app_name=${quote(options.projectName)})`,
      '',
      '',
      'async def send_password_reset(to: str, reset_url: str, minutes: int) -> None:',
      '    await send(to, "Password reset", "password_reset", reset_url=reset_url, minutes=minutes)',
      '',
      '',
      'async def send_notification(to: str, title: str, message: str) -> None:',
      '    await send(to, title, "notification", title=title, message=message)',
    ]),
  )
  for (const [name, body] of Object.entries(MAIL_TEMPLATES)) {
    files.set(`app/mail/templates/${name}.html`, joinLines(body))
  }
  return files
}

function storageBackend(backend: StorageBackend): string[] {
  switch (backend) {
    case 'local':
      return [
        'import os',
        'from pathlib import Path',
        '',
        '',
        'class LocalFileStorage:',
        '    def __init__(self) -> None:',
        '        self.root = Path(os.environ.get("STORAGE_DIR", "uploads"))',
        '',
        '    def put(self, key: str, data: bytes) -> str:',
        '        self.root.mkdir(parents=True, exist_ok=True)',
        '        (self.root / key).write_bytes(data)',
        '        return key',
        '',
        '    def get(self, key: str) -> bytes:',
        '        return (self.root / key).read_bytes()',
        '',
        '    def delete(self, key: str) -> None:',
        '        (self.root / key).unlink(missing_ok=True)',
        '',
        '',
        'storage = LocalFileStorage()',
      ]
    case 's3':
      return [
        'import os',
        '',
        'import boto3',
        '',
        '',
        'class S3FileStorage:',
        '    def __init__(self) -> None:',
        '        self.client = boto3.client("s3")',
        '        self.bucket = os.environ["S3_BUCKET"]',
        '',
        '    def put(self, key: str, data: bytes) -> str:',
        '        self.client.put_object(Bucket=self.bucket, Key=key, Body=data)',
        '        return key',
        '',
        '    def get(self, key: str) -> bytes:',
        '        return self.client.get_object(Bucket=self.bucket, Key=key)["Body"].read()',
        '',
        '    def delete(self, key: str) -> None:',
        '        self.client.delete_object(Bucket=self.bucket, Key=key)',
        '',
        '',
        'storage = S3FileStorage()',
      ]
    case 'azure':
      return [
        'import os',
        '',
        'from azure.storage.blob import BlobServiceClient',
        '',
        '',
        'class AzureFileStorage:',
        '    def __init__(self) -> None:',
        '        service = BlobServiceClient.from_connection_string(os.environ["AZURE_STORAGE_CONNECTION_STRING"])',
        '        self.container = service.get_container_client(os.environ.get("AZURE_STORAGE_CONTAINER", "uploads"))',
        '',
        '    def put(self, key: str, data: bytes) -> str:',
        '        self.container.upload_blob(key, data, overwrite=True)',
        '        return key',
        '',
        '    def get(self, key: str) -> bytes:',
        '        return self.container.download_blob(key).readall()',
        '',
        '    def delete(self, key: str) -> None:',
        '        self.container.delete_blob(key)',
        '',
        '',
        'storage = AzureFileStorage()',
      ]
  }
}

function fileStorage(options: FeatureOptions): Map<string, string> {
  const files = new Map<string, string>()
  files.set('app/files/storage.py', joinLines(storageBackend(options.storageBackend)))
  files.set(
    'app/files/router.py',
    joinLines([
      'import uuid',
      '',
      'from fastapi import APIRouter, UploadFile',
      'from fastapi.responses import Response',
      '',
      'from app.files.storage import storage',
      '',
      'router = APIRouter(prefix="/api/files", tags=["files"])',
      '',
      '',
      '@router.post("", status_code=201)',
      'async def upload(file: UploadFile) -> dict[str, str]:',
      '    key = f"{uuid.uuid4()}-{file.filename}"',
      '    return {"key": storage.put(key, await file.read())}',
      '',
      '',
      '@router.get("/{key}")',
      'def download(key: str) -> Response:',
      '    return Response(content=storage.get(key), media_type="application/octet-stream")',
      '',
      '',
      '@router.delete("/{key}", status_code=204)',
      'def remove(key: str) -> None:',
      '    storage.delete(key)',
    ]),
  )
  return files
}

function passwordReset(options: FeatureOptions): Map<string, string> {
  const files = new Map<string, string>()
  files.set(
    'app/auth/password_reset/models.py',
    joinLines([
      'from datetime import datetime',
      '',
      'from sqlalchemy import DateTime, String',
      'from sqlalchemy.orm import Mapped, mapped_column',
      '',
      'from app.models.base import AuditMixin, Base',
      '',
      '',
      'class PasswordResetToken(AuditMixin, Base):',
      '    __tablename__ = "password_reset_tokens"',
      '',
      '    token: Mapped[str] = mapped_column(String(64), unique=True)',
      '    email: Mapped[str] = mapped_column(String(255))',
      '    expires_at: Mapped[datetime] = mapped_column(DateTime(timezone=True))',
      '    used: Mapped[bool] = mapped_column(default=False)',
    ]),
  )
  files.set(
    'app/auth/password_reset/router.py',
    joinLines([
      'import secrets',
      'from datetime import datetime, timedelta, timezone',
      '',
      'from fastapi import APIRouter, Depends, HTTPException',
      'from pydantic import BaseModel, EmailStr, Field',
      'from sqlalchemy import select',
      'from sqlalchemy.orm import Session',
      '',
      'from app.auth.password_reset.models import PasswordResetToken',
      'from app.database import get_db',
      '',
      `TOKEN_LIFETIME = timedelta(minutes=${options.resetTokenMinutes})`,
      '',
      'router = APIRouter(prefix="/auth/password", tags=["auth"])',
      '',
      '',
      'class ForgotPasswordRequest(BaseModel):',
      '    email: EmailStr',
      '',
      '',
      'class ResetPasswordRequest(BaseModel):',
      '    token: str',
      '    password: str = Field(min_length=8)',
      '',
      '',
      '@router.post("/forgot", status_code=202)',
      'def forgot(body: ForgotPasswordRequest, db: Session = Depends(get_db)) -> None:',
      '    token = secrets.token_hex(32)',
      '    expires_at = datetime.now(timezone.utc) + TOKEN_LIFETIME',
      '    db.add(PasswordResetToken(token=token, email=body.email, expires_at=expires_at))',
      '    db.commit()',
      '',
      '',
      '@router.post("/reset", status_code=204)',
      'def reset(body: ResetPasswordRequest, db: Session = Depends(get_db)) -> None:',
      '    entry = db.scalar(select(PasswordResetToken).where(PasswordResetToken.token == body.token))',
      '    if entry is None or entry.used or entry.expires_at < datetime.now(timezone.utc):',
      '        raise HTTPException(status_code=400, detail="Invalid or expired token")',
      '    entry.used = True',
      '    db.commit()',
    ]),
  )
  return files
}

export const fastApiFeatures: FeaturePackSet = {
  'social-login': definePack('social-login', socialLogin),
  mail: definePack('mail', mail),
  'file-storage': definePack('file-storage', fileStorage),
  'password-reset': definePack('password-reset', passwordReset),
}
