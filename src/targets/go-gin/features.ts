/**
 * Gin feature packs
 *
 * Each pack is a package under internal/ with a `Register` function for the
 * API router group.
 */

import { definePack } from '../../features/feature-pack.js'
import type { FeatureOptions, FeaturePackSet, StorageBackend } from '../../features/feature-pack.js'
import { joinLines, quote } from '../renderer.js'
import { goImports } from './renderer.js'

const MAIL_TEMPLATES: Record<string, string[]> = {
  welcome: ['<h1>Welcome, {{.Name}}</h1>', '<p>Your {{.AppName}} account is ready.</p>'],
  password_reset: ['<h1>Reset your password</h1>', '<p>Follow <a href="{{.ResetURL}}">this link</a> within {{.Minutes}} minutes.</p>'],
  notification: ['<h1>{{.Title}}</h1>', '<p>{{.Message}}</p>'],
}

function socialLogin(options: FeatureOptions): Map<string, string> {
  const files = new Map<string, string>()

  const providers = options.socialProviders.map((provider) => {
    const env = provider.toUpperCase()
    return [
      `\t\t${quote(provider)}: {`,
      `\t\t\tClientID:     os.Getenv("${env}_CLIENT_ID"),`,
      `\t\t\tClientSecret: os.Getenv("${env}_CLIENT_SECRET"),`,
      '\t\t\tEndpoint: oauth2.Endpoint{',
      `\t\t\t\tAuthURL:  os.Getenv("${env}_AUTH_URL"),`,
      `\t\t\t\tTokenURL: os.Getenv("${env}_TOKEN_URL"),`,
      '\t\t\t},',
      `\t\t\tRedirectURL: os.Getenv("${env}_REDIRECT_URL"),`,
      '\t\t\tScopes:      []string{"openid", "email", "profile"},',
      '\t\t},',
    ]
  })

  files.set(
    'internal/auth/social/social.go',
    joinLines([
      'package social',
      '',
      ...goImports(['crypto/rand', 'encoding/hex', 'net/http', 'os', 'github.com/gin-gonic/gin', 'golang.org/x/oauth2', 'gorm.io/gorm', `${options.namespace}/internal/models`]),
      '// Account links an external identity to the application.',
      'type Account struct {',
      '\tmodels.BaseModel',
      '\tProvider   string  `gorm:"not null;uniqueIndex:idx_social_provider" json:"provider"`',
      '\tProviderID string  `gorm:"not null;uniqueIndex:idx_social_provider" json:"providerId"`',
      '\tEmail      *string `json:"email,omitempty"`',
      '}',
      '',
      'func (Account) TableName() string { return "social_accounts" }',
      '',
      'func providers() map[string]*oauth2.Config {',
      '\treturn map[string]*oauth2.Config{',
      ...providers.flat(),
      '\t}',
      '}',
      '',
      '// Register mounts the login and callback routes under /auth.',
      'func Register(r *gin.RouterGroup, db *gorm.DB) {',
      '\tconfigs := providers()',
      '\tauth := r.Group("/auth")',
      '',
      '\tauth.GET("/:provider", func(c *gin.Context) {',
      '\t\tconfig, ok := configs[c.Param("provider")]',
      '\t\tif !ok {',
      '\t\t\tc.JSON(http.StatusNotFound, gin.H{"error": "unknown provider"})',
      '\t\t\treturn',
      '\t\t}',
      '\t\tstate := make([]byte, 16)',
      '\t\tif _, err := rand.Read(state); err != nil {',
      '\t\t\tc.JSON(http.StatusInternalServerError, gin.H{"error": err.Error()})',
      '\t\t\treturn',
      '\t\t}',
      '\t\tc.Redirect(http.StatusFound, config.AuthCodeURL(hex.EncodeToString(state)))',
      '\t})',
      '',
      '\tauth.GET("/:provider/callback", func(c *gin.Context) {',
      '\t\tprovider := c.Param("provider")',
      '\t\tconfig, ok := configs[provider]',
      '\t\tif !ok {',
      '\t\t\tc.JSON(http.StatusNotFound, gin.H{"error": "unknown provider"})',
      '\t\t\treturn',
      '\t\t}',
      '\t\ttoken, err := config.Exchange(c.Request.Context(), c.Query("code"))',
      '\t\tif err != nil {',
      '\t\t\tc.JSON(http.StatusUnauthorized, gin.H{"error": err.Error()})',
      '\t\t\treturn',
      '\t\t}',
      '\t\tsubject, _ := token.Extra("sub").(string)',
      '\t\taccount := Account{Provider: provider, ProviderID: subject}',
      '\t\tif err := db.Where(&account).FirstOrCreate(&account).Error; err != nil {',
      '\t\t\tc.JSON(http.StatusInternalServerError, gin.H{"error": err.Error()})',
      '\t\t\treturn',
      '\t\t}',
      '\t\tc.JSON(http.StatusOK, account)',
      '\t})',
      '}',
    ]),
  )
  return files
}

function mail(options: FeatureOptions): Map<string, string> {
  const files = new Map<string, string>()

  files.set(
    'internal/mail/mail.go',
    joinLines([
      'package mail',
      '',
      ...goImports(['bytes', 'embed', 'fmt', 'html/template', 'log', 'net/smtp', 'os']),
      '//go:embed templates/*.html',
      'var templateFS embed.FS',
      '',
      'var templates = template.Must(template.ParseFS(templateFS, "templates/*.html"))',
      '',
      `const appName = ${quote(options.projectName)}`,
      '',
      '// Sender delivers HTML mail over SMTP.',
      'type Sender struct {',
      '\tAddr string',
      '\tFrom string',
      '\tAuth smtp.Auth',
      '}',
      '',
      '// NewSender reads SMTP_HOST, SMTP_PORT, SMTP_USERNAME, SMTP_PASSWORD and MAIL_FROM.',
      'func NewSender() *Sender {',
      '\thost := os.Getenv("SMTP_HOST")',
      '\treturn &Sender{',
      '\t\tAddr: fmt.Sprintf("%s:%s", host, os.Getenv("SMTP_PORT")),',
      '\t\tFrom: os.Getenv("MAIL_FROM"),',
      '\t\tAuth: smtp.PlainAuth("", os.Getenv("SMTP_USERNAME"), os.Getenv("SMTP_PASSWORD"), host),',
      '\t}',
      '}',
      '',
      'func (s *Sender) Send(to, subject, name string, data any) error {',
      '\tvar body bytes.Buffer',
      '\tif err := templates.ExecuteTemplate(&body, name+".html", data); err != nil {',
      '\t\treturn fmt.Errorf("render %s: %w", name, err)',
      '\t}',
      '\tmessage := fmt.Sprintf("To: %s\\r\\nSubject: %s\\r\\nMIME-Version: 1.0\\r\\nContent-Type: text/html; charset=UTF-8\\r\\n\\r\\n%s", to, subject, body.String())',
      '\tif err := smtp.SendMail(s.Addr, s.Auth, s.From, []string{to}, []byte(message)); err != nil {',
      '\t\tlog.Printf("send %s to %s: %v", name, to, err)',
      '\t\treturn err',
      '\t}',
      '\treturn nil',
      '}',
      '',
      'func (s *Sender) SendWelcome(to, name string) error {',
      '\treturn s.Send(to, "Welcome to "+appName, "welcome", map[string]any{"Name": name, "AppName": appName})',
      '}',
      '',
      'func (s *Sender) SendPasswordReset(to, resetURL string, minutes int) error {',
      '\treturn s.Send(to, "Password reset", "password_reset", map[string]any{"ResetURL": resetURL, "Minutes": minutes})',
      '}',
      '',
      'func (s *Sender) SendNotification(to, title, message string) error {',
      '\treturn s.Send(to, title, "notification", map[string]any{"Title": title, "Message": message})',
      '}',
    ]),
  )

  for (const [name, body] of Object.entries(MAIL_TEMPLATES)) {
    files.set(`internal/mail/templates/${name}.html`, joinLines(['<!DOCTYPE html>', '<html>', '<body>', ...body, '</body>', '</html>']))
  }
  return files
}

const STORAGE_IMPL: Record<StorageBackend, { file: string; imports: string[]; body: string[] }> = {
  local: {
    file: 'local_storage.go',
    imports: ['context', 'os', 'path/filepath'],
    body: [
      '// Local keeps files under a root directory.',
      'type Local struct {',
      '\tRoot string',
      '}',
      '',
      '// New reads STORAGE_ROOT, defaulting to ./uploads.',
      'func New(_ context.Context) (Storage, error) {',
      '\troot := os.Getenv("STORAGE_ROOT")',
      '\tif root == "" {',
      '\t\troot = "uploads"',
      '\t}',
      '\treturn &Local{Root: root}, os.MkdirAll(root, 0o755)',
      '}',
      '',
      'func (l *Local) Put(_ context.Context, key string, data []byte) (string, error) {',
      '\treturn key, os.WriteFile(filepath.Join(l.Root, filepath.Base(key)), data, 0o644)',
      '}',
      '',
      'func (l *Local) Get(_ context.Context, key string) ([]byte, error) {',
      '\treturn os.ReadFile(filepath.Join(l.Root, filepath.Base(key)))',
      '}',
      '',
      'func (l *Local) Delete(_ context.Context, key string) error {',
      '\treturn os.Remove(filepath.Join(l.Root, filepath.Base(key)))',
      '}',
    ],
  },
  s3: {
    file: 's3_storage.go',
    imports: ['bytes', 'context', 'io', 'os', 'github.com/aws/aws-sdk-go-v2/aws', 'github.com/aws/aws-sdk-go-v2/config', 'github.com/aws/aws-sdk-go-v2/service/s3'],
    body: [
      '// S3 stores files in one bucket.',
      'type S3 struct {',
      '\tClient *s3.Client',
      '\tBucket string',
      '}',
      '',
      '// New reads the AWS default configuration and STORAGE_BUCKET.',
      'func New(ctx context.Context) (Storage, error) {',
      '\tcfg, err := config.LoadDefaultConfig(ctx)',
      '\tif err != nil {',
      '\t\treturn nil, err',
      '\t}',
      '\treturn &S3{Client: s3.NewFromConfig(cfg), Bucket: os.Getenv("STORAGE_BUCKET")}, nil',
      '}',
      '',
      'func (s *S3) Put(ctx context.Context, key string, data []byte) (string, error) {',
      '\t_, err := s.Client.PutObject(ctx, &s3.PutObjectInput{Bucket: aws.String(s.Bucket), Key: aws.String(key), Body: bytes.NewReader(data)})',
      '\treturn key, err',
      '}',
      '',
      'func (s *S3) Get(ctx context.Context, key string) ([]byte, error) {',
      '\tout, err := s.Client.GetObject(ctx, &s3.GetObjectInput{Bucket: aws.String(s.Bucket), Key: aws.String(key)})',
      '\tif err != nil {',
      '\t\treturn nil, err',
      '\t}',
      '\tdefer out.Body.Close()',
      '\treturn io.ReadAll(out.Body)',
      '}',
      '',
      'func (s *S3) Delete(ctx context.Context, key string) error {',
      '\t_, err := s.Client.DeleteObject(ctx, &s3.DeleteObjectInput{Bucket: aws.String(s.Bucket), Key: aws.String(key)})',
      '\treturn err',
      '}',
    ],
  },
  azure: {
    file: 'azure_storage.go',
    imports: ['bytes', 'context', 'io', 'os', 'github.com/Azure/azure-sdk-for-go/sdk/storage/azblob'],
    body: [
      '// Azure stores files in one blob container.',
      'type Azure struct {',
      '\tClient    *azblob.Client',
      '\tContainer string',
      '}',
      '',
      '// New reads AZURE_STORAGE_CONNECTION_STRING and STORAGE_CONTAINER.',
      'func New(_ context.Context) (Storage, error) {',
      '\tclient, err := azblob.NewClientFromConnectionString(os.Getenv("AZURE_STORAGE_CONNECTION_STRING"), nil)',
      '\tif err != nil {',
      '\t\treturn nil, err',
      '\t}',
      '\treturn &Azure{Client: client, Container: os.Getenv("STORAGE_CONTAINER")}, nil',
      '}',
      '',
      'func (a *Azure) Put(ctx context.Context, key string, data []byte) (string, error) {',
      '\t_, err := a.Client.UploadStream(ctx, a.Container, key, bytes.NewReader(data), nil)',
      '\treturn key, err',
      '}',
      '',
      'func (a *Azure) Get(ctx context.Context, key string) ([]byte, error) {',
      '\tout, err := a.Client.DownloadStream(ctx, a.Container, key, nil)',
      '\tif err != nil {',
      '\t\treturn nil, err',
      '\t}',
      '\tdefer out.Body.Close()',
      '\treturn io.ReadAll(out.Body)',
      '}',
      '',
      'func (a *Azure) Delete(ctx context.Context, key string) error {',
      '\t_, err := a.Client.DeleteBlob(ctx, a.Container, key, nil)',
      '\treturn err',
      '}',
    ],
  },
}

function fileStorage(options: FeatureOptions): Map<string, string> {
  const files = new Map<string, string>()
  const impl = STORAGE_IMPL[options.storageBackend]

  files.set(
    'internal/storage/storage.go',
    joinLines([
      'package storage',
      '',
      ...goImports(['context']),
      '// Storage reads and writes uploaded files by key.',
      'type Storage interface {',
      '\tPut(ctx context.Context, key string, data []byte) (string, error)',
      '\tGet(ctx context.Context, key string) ([]byte, error)',
      '\tDelete(ctx context.Context, key string) error',
      '}',
    ]),
  )

  files.set(`internal/storage/${impl.file}`, joinLines(['package storage', '', ...goImports(impl.imports), ...impl.body]))

  files.set(
    'internal/storage/handler.go',
    joinLines([
      'package storage',
      '',
      ...goImports(['io', 'net/http', 'github.com/gin-gonic/gin', 'github.com/google/uuid']),
      '// Register mounts upload, download and delete under /files.',
      'func Register(r *gin.RouterGroup, store Storage) {',
      '\tfiles := r.Group("/files")',
      '',
      '\tfiles.POST("", func(c *gin.Context) {',
      '\t\theader, err := c.FormFile("file")',
      '\t\tif err != nil {',
      '\t\t\tc.JSON(http.StatusBadRequest, gin.H{"error": err.Error()})',
      '\t\t\treturn',
      '\t\t}',
      '\t\tfile, err := header.Open()',
      '\t\tif err != nil {',
      '\t\t\tc.JSON(http.StatusBadRequest, gin.H{"error": err.Error()})',
      '\t\t\treturn',
      '\t\t}',
      '\t\tdefer file.Close()',
      '\t\tdata, err := io.ReadAll(file)',
      '\t\tif err != nil {',
      '\t\t\tc.JSON(http.StatusBadRequest, gin.H{"error": err.Error()})',
      '\t\t\treturn',
      '\t\t}',
      '\t\tkey, err := store.Put(c.Request.Context(), uuid.NewString()+"-"+header.Filename, data)',
      '\t\tif err != nil {',
      '\t\t\tc.JSON(http.StatusInternalServerError, gin.H{"error": err.Error()})',
      '\t\t\treturn',
      '\t\t}',
      '\t\tc.JSON(http.StatusCreated, gin.H{"key": key})',
      '\t})',
      '',
      '\tfiles.GET("/:key", func(c *gin.Context) {',
      '\t\tdata, err := store.Get(c.Request.Context(), c.Param("key"))',
      '\t\tif err != nil {',
      '\t\t\tc.JSON(http.StatusNotFound, gin.H{"error": err.Error()})',
      '\t\t\treturn',
      '\t\t}',
      '\t\tc.Data(http.StatusOK, "application/octet-stream", data)',
      '\t})',
      '',
      '\tfiles.DELETE("/:key", func(c *gin.Context) {',
      '\t\tif err := store.Delete(c.Request.Context(), c.Param("key")); err != nil {',
      '\t\t\tc.JSON(http.StatusInternalServerError, gin.H{"error": err.Error()})',
      '\t\t\treturn',
      '\t\t}',
      '\t\tc.Status(http.StatusNoContent)',
      '\t})',
      '}',
    ]),
  )
  return files
}

function passwordReset(options: FeatureOptions): Map<string, string> {
  const files = new Map<string, string>()

  files.set(
    'internal/auth/reset/reset.go',
    joinLines([
      'package reset',
      '',
      ...goImports(['crypto/rand', 'encoding/hex', 'errors', 'net/http', 'time', 'github.com/gin-gonic/gin', 'gorm.io/gorm', `${options.namespace}/internal/models`]),
      `const TokenLifetime = ${options.resetTokenMinutes} * time.Minute`,
      '',
      'var ErrInvalidToken = errors.New("invalid or expired token")',
      '',
      '// Token is a single-use password reset token.',
      'type Token struct {',
      '\tmodels.BaseModel',
      '\tToken     string    `gorm:"not null;uniqueIndex" json:"-"`',
      '\tEmail     string    `gorm:"not null" json:"email"`',
      '\tExpiresAt time.Time `gorm:"not null" json:"expiresAt"`',
      '\tUsed      bool      `gorm:"not null;default:false" json:"used"`',
      '}',
      '',
      'func (Token) TableName() string { return "password_reset_tokens" }',
      '',
      'type Service struct {',
      '\tDB *gorm.DB',
      '}',
      '',
      'func (s *Service) Request(email string) (string, error) {',
      '\traw := make([]byte, 32)',
      '\tif _, err := rand.Read(raw); err != nil {',
      '\t\treturn "", err',
      '\t}',
      '\ttoken := hex.EncodeToString(raw)',
      '\tentry := Token{Token: token, Email: email, ExpiresAt: time.Now().Add(TokenLifetime)}',
      '\treturn token, s.DB.Create(&entry).Error',
      '}',
      '',
      'func (s *Service) Consume(token string) (string, error) {',
      '\tvar entry Token',
      '\tif err := s.DB.Where("token = ?", token).First(&entry).Error; err != nil {',
      '\t\treturn "", ErrInvalidToken',
      '\t}',
      '\tif entry.Used || time.Now().After(entry.ExpiresAt) {',
      '\t\treturn "", ErrInvalidToken',
      '\t}',
      '\tentry.Used = true',
      '\treturn entry.Email, s.DB.Save(&entry).Error',
      '}',
      '',
      '// Register mounts /auth/password/forgot and /auth/password/reset.',
      'func Register(r *gin.RouterGroup, service *Service) {',
      '\tgroup := r.Group("/auth/password")',
      '',
      '\tgroup.POST("/forgot", func(c *gin.Context) {',
      '\t\tvar body struct {',
      '\t\t\tEmail string `json:"email" binding:"required,email"`',
      '\t\t}',
      '\t\tif err := c.ShouldBindJSON(&body); err != nil {',
      '\t\t\tc.JSON(http.StatusBadRequest, gin.H{"error": err.Error()})',
      '\t\t\treturn',
      '\t\t}',
      '\t\tif _, err := service.Request(body.Email); err != nil {',
      '\t\t\tc.JSON(http.StatusInternalServerError, gin.H{"error": err.Error()})',
      '\t\t\treturn',
      '\t\t}',
      '\t\tc.Status(http.StatusAccepted)',
      '\t})',
      '',
      '\tgroup.POST("/reset", func(c *gin.Context) {',
      '\t\tvar body struct {',
      '\t\t\tToken    string `json:"token" binding:"required"`',
      '\t\t\tPassword string `json:"password" binding:"required"`',
      '\t\t}',
      '\t\tif err := c.ShouldBindJSON(&body); err != nil {',
      '\t\t\tc.JSON(http.StatusBadRequest, gin.H{"error": err.Error()})',
      '\t\t\treturn',
      '\t\t}',
      '\t\tif _, err := service.Consume(body.Token); err != nil {',
      '\t\t\tc.JSON(http.StatusBadRequest, gin.H{"error": err.Error()})',
      '\t\t\treturn',
      '\t\t}',
      '\t\tc.Status(http.StatusNoContent)',
      '\t})',
      '}',
    ]),
  )
  return files
}

export const ginFeatures: FeaturePackSet = {
  'social-login': definePack('social-login', socialLogin),
  mail: definePack('mail', mail),
  'file-storage': definePack('file-storage', fileStorage),
  'password-reset': definePack('password-reset', passwordReset),
}
