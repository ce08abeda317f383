import helmet from "helmet";
import type { INestApplication } from "@nestjs/common";
import { ValidationPipe } from "@nestjs/common";
import { DocumentBuilder, SwaggerDocumentOptions, SwaggerModule } from "@nestjs/swagger";
import { HttpExceptionFilter } from "@/common/filters/http-exception.filter";
import { ResponseTimeInterceptor } from "@/common/interceptors/response-time.interceptor";
import { ENV_HELPERS } from "@/config/environment.constants";

/**
 * Middleware, validation, error handling and routing shared by the server and the e2e tests
 */
export function configureApp(app: INestApplication, basePath: string): void {
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          styleSrc: ["'self'", "'unsafe-inline'"],
          scriptSrc: ["'self'"],
          imgSrc: ["'self'", "data:", "https:"],
        },
      },
      crossOriginEmbedderPolicy: false,
    })
  );

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      disableErrorMessages: ENV_HELPERS.isProduction(),
    })
  );

  app.useGlobalFilters(new HttpExceptionFilter());
  app.useGlobalInterceptors(new ResponseTimeInterceptor());

  if (basePath) {
    app.setGlobalPrefix(basePath);
  }
}

export function setupSwaggerDocumentation(app: INestApplication, basePath: string): void {
  const config = new DocumentBuilder()
    .setTitle("Han-Viet Lookup API")
    .setDescription(
      "Converts Chinese text to Hanyu Pinyin and translates it to Vietnamese through a cached chain of " +
        "translation providers."
    )
    .setVersion("1.0.0")
    .addTag("Lookup", "Single and batch lookups")
    .addTag("Translation Cache", "Inspect and clear the persisted translation cache")
    .addTag("System Health", "Service and provider status")
    .build();

  const options: SwaggerDocumentOptions = {
    operationIdFactory: (_controllerKey: string, methodKey: string) => methodKey,
  };

  const document = SwaggerModule.createDocument(app, config, options);
  SwaggerModule.setup(`${basePath}/api-doc`, app, document);
}
